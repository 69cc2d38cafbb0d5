import type { ExhaustedAction } from '../calls/types';

export type MenuOption<T> =
  | { type: 'invoke'; handler: () => Promise<T> | T }
  | { type: 'value'; value: T };

export interface MenuDefinition<T> {
  prompt: string;
  options: ReadonlyMap<string, MenuOption<T>>;
  /** Longest option token; voice menus collect this many digits. */
  tokenLength: number;
  timeoutMs?: number;
  maxRetries: number;
  retryPrompt: string;
  onExhausted: ExhaustedAction<T>;
}

export interface MenuIO {
  /** Presents the prompt and returns one input ('' for no input). May throw TimeoutError. */
  ask(prompt: string, tokenLength: number, timeoutMs?: number): Promise<string>;
  hangup(): Promise<void>;
}

export type MenuResult<T> =
  | { status: 'selected'; key: string; value: T }
  | { status: 'exhausted'; value?: T };
