import type { ExhaustedAction, MenuCallbacks } from '../calls/types';
import { ConfigurationError, TimeoutError } from '../errors';
import { log } from '../log';
import type { MenuDefinition, MenuIO, MenuOption, MenuResult } from './types';

const DTMF_TOKEN = /^[0-9*]+$/;

export interface MenuSettings<T> {
  timeoutMs?: number;
  maxRetries: number;
  retryPrompt: string;
  onExhausted?: ExhaustedAction<T>;
  /** Voice menus can only match keypad tokens; `#` ends digit entry. */
  dtmfOnly: boolean;
}

export function callbacksToOptions<T>(callbacks: MenuCallbacks<T>): Record<string, MenuOption<T>> {
  const options: Record<string, MenuOption<T>> = {};
  for (const [key, handler] of Object.entries(callbacks)) {
    options[key] = { type: 'invoke', handler };
  }
  return options;
}

export function keysToOptions(keys: readonly string[]): Record<string, MenuOption<string>> {
  const options: Record<string, MenuOption<string>> = {};
  for (const key of keys) {
    options[key] = { type: 'value', value: key.trim() };
  }
  return options;
}

/**
 * Resolves an option mapping into a menu definition up front, so dispatch is
 * a plain lookup on the collected token.
 */
export function buildMenuDefinition<T>(
  prompt: string,
  options: Record<string, MenuOption<T>>,
  settings: MenuSettings<T>,
): MenuDefinition<T> {
  const entries = Object.entries(options);
  if (entries.length === 0) {
    throw new ConfigurationError('menu needs at least one option');
  }
  if (!Number.isInteger(settings.maxRetries) || settings.maxRetries < 0) {
    throw new ConfigurationError(`menu maxRetries must be a non-negative integer, got ${settings.maxRetries}`);
  }
  if (settings.timeoutMs !== undefined && !(settings.timeoutMs > 0)) {
    throw new ConfigurationError(`menu timeoutMs must be positive, got ${settings.timeoutMs}`);
  }

  const resolved = new Map<string, MenuOption<T>>();
  let tokenLength = 0;
  for (const [rawKey, option] of entries) {
    const key = rawKey.trim();
    if (key === '') {
      throw new ConfigurationError('menu option keys must not be empty');
    }
    if (settings.dtmfOnly && !DTMF_TOKEN.test(key)) {
      throw new ConfigurationError(`menu option "${key}" cannot be entered on a keypad`);
    }
    if (resolved.has(key)) {
      continue;
    }
    resolved.set(key, option);
    tokenLength = Math.max(tokenLength, key.length);
  }

  return {
    prompt,
    options: resolved,
    tokenLength,
    timeoutMs: settings.timeoutMs,
    maxRetries: settings.maxRetries,
    retryPrompt: settings.retryPrompt,
    onExhausted: settings.onExhausted ?? { type: 'hangup' },
  };
}

/**
 * Prompts up to `maxRetries + 1` times. Unknown tokens, empty input and
 * timeouts all count as a failed attempt; the exhausted action runs once.
 */
export async function runMenu<T>(
  io: MenuIO,
  definition: MenuDefinition<T>,
  logContext: Record<string, unknown> = {},
): Promise<MenuResult<T>> {
  for (let attempt = 0; attempt <= definition.maxRetries; attempt += 1) {
    const prompt =
      attempt === 0 ? definition.prompt : `${definition.retryPrompt} ${definition.prompt}`;

    let input = '';
    try {
      input = (await io.ask(prompt, definition.tokenLength, definition.timeoutMs)).trim();
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
    }

    const option = input === '' ? undefined : definition.options.get(input);
    if (option) {
      log.info({ event: 'menu_selected', attempt, key: input, ...logContext }, 'menu option selected');
      const value = option.type === 'invoke' ? await option.handler() : option.value;
      return { status: 'selected', key: input, value };
    }

    log.info(
      {
        event: 'menu_no_match',
        attempt,
        input_length: input.length,
        retries_left: definition.maxRetries - attempt,
        ...logContext,
      },
      'menu input not recognized',
    );
  }

  log.warn({ event: 'menu_exhausted', action: definition.onExhausted.type, ...logContext }, 'menu retries exhausted');

  const action = definition.onExhausted;
  switch (action.type) {
    case 'hangup':
      await io.hangup();
      return { status: 'exhausted' };
    case 'invoke':
      return { status: 'exhausted', value: await action.handler() };
    case 'value':
      return { status: 'exhausted', value: action.value };
  }
}
