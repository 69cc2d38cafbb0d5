import type http from 'http';
import type { RuntimeConfig } from './config';
import { buildHttpServer } from './httpServer';
import { log } from './log';
import { OutboundInitiator } from './outbound/initiator';
import { Notifier } from './outbound/notifier';
import { AsteriskGateway } from './pbx/asteriskGateway';
import { DialogServer, type PbxGateway } from './server';
import { createHttpSynthesizer } from './tts/httpSynthesizer';
import { CachedSpeechResolver, UnconfiguredSpeechResolver } from './tts/speechCache';
import type { SpeechResolver } from './tts/types';

export interface Runtime {
  config: RuntimeConfig;
  server: DialogServer;
  initiator: OutboundInitiator;
  notifier: Notifier;
  http: http.Server;
  /** Listens for HTTP and serves PBX events until `stop()`. */
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createSpeechResolver(config: RuntimeConfig): SpeechResolver {
  if (!config.tts.url) {
    log.warn({ event: 'tts_unconfigured' }, 'TTS_URL not set, say() will fail');
    return new UnconfiguredSpeechResolver();
  }
  return new CachedSpeechResolver({
    soundsDir: config.tts.soundsDir,
    subdir: config.tts.soundsSubdir,
    synthesizer: createHttpSynthesizer(config.tts.url),
    defaultVoice: config.tts.voice,
  });
}

/** Wires the production collaborators around one explicit configuration. */
export function createRuntime(
  config: RuntimeConfig,
  overrides: { gateway?: PbxGateway; speech?: SpeechResolver } = {},
): Runtime {
  const gateway = overrides.gateway ?? new AsteriskGateway(config);
  const speech = overrides.speech ?? createSpeechResolver(config);
  const server = new DialogServer({ config, gateway, speech });
  const initiator = new OutboundInitiator({ config, registry: server.registry, normalizer: server.normalizer });
  const notifier = new Notifier(initiator, config);
  const { server: httpServer } = buildHttpServer(server);

  let serving: Promise<void> | undefined;

  return {
    config,
    server,
    initiator,
    notifier,
    http: httpServer,
    async start() {
      await new Promise<void>((resolve) => {
        httpServer.listen(config.http.port, () => {
          log.info({ port: config.http.port }, 'http server listening');
          resolve();
        });
      });
      serving = server.serveForever();
      await serving;
    },
    async stop() {
      await server.close();
      await serving;
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}
