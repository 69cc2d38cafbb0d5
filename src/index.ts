export { loadConfig, type EnvInput, type RuntimeConfig } from './config';
export {
  ChannelGoneError,
  ConfigurationError,
  OriginationError,
  ProtocolError,
  RuntimeError,
  SessionBusyError,
  TimeoutError,
  isChannelGone,
  type RuntimeErrorCode,
} from './errors';
export { log, type Logger } from './log';
export { Session, type SessionDeps, type SessionInit, type SessionSettings } from './calls/session';
export { SessionRegistry, type RouteOutcome, type SessionRegistryOptions } from './calls/sessionRegistry';
export type * from './calls/types';
export { EventNormalizer, conversationId, extractNumber, translateAmiEvent, translateAriEvent } from './events/normalizer';
export type * from './events/types';
export { buildMenuDefinition, runMenu } from './menu/menuEngine';
export type { MenuDefinition, MenuIO, MenuOption, MenuResult } from './menu/types';
export { DialogServer, UNAVAILABLE_TEXT_REPLY, type ExtensionRegistration, type PbxGateway } from './server';
export { OutboundInitiator, type OriginateOptions } from './outbound/initiator';
export { Notifier, type ContactMethod } from './outbound/notifier';
export { AsteriskGateway } from './pbx/asteriskGateway';
export type * from './pbx/types';
export { AmiClient } from './ami/amiClient';
export { AriClient } from './ari/ariClient';
export { AriEventStream } from './ari/ariEvents';
export { CachedSpeechResolver, UnconfiguredSpeechResolver } from './tts/speechCache';
export { createHttpSynthesizer } from './tts/httpSynthesizer';
export type { SpeechResolver, Synthesizer, TTSRequest, TTSResult } from './tts/types';
export { createRuntime, type Runtime } from './runtime';
