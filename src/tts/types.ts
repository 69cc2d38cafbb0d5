export interface TTSRequest {
  text: string;
  voice?: string;
}

export interface TTSResult {
  audio: Buffer;
  contentType: string;
}

export type Synthesizer = (request: TTSRequest) => Promise<TTSResult>;

/** Maps text to a media reference the PBX can play. */
export interface SpeechResolver {
  resolve(text: string, voice?: string): Promise<string>;
}
