import type { SessionKind } from '../calls/types';
import type { RuntimeConfig } from '../config';
import { AmiClient } from '../ami/amiClient';
import { AriClient } from '../ari/ariClient';
import { AriEventStream } from '../ari/ariEvents';
import { ORIGINATED_STASIS_ARG, TEXT_USER_EVENT } from '../events/normalizer';
import type { RawPbxEvent } from '../events/types';
import { log } from '../log';
import type {
  OriginateRequest,
  PbxCommands,
  PbxEventSink,
  PbxEventSource,
  PlaybackControl,
  PlayRequest,
  RecordRequest,
  SendTextRequest,
} from './types';

export interface GatewayCollaborators {
  ari: Pick<AriClient, 'answer' | 'play' | 'stopPlayback' | 'controlPlayback' | 'record' | 'hangup'>;
  ariEvents: PbxEventSource;
  ami: Pick<AmiClient, 'send'> & PbxEventSource;
}

type DtmfSource = RuntimeConfig['asterisk']['dtmfSource'];

function rawEventType(event: RawPbxEvent): string | undefined {
  const raw = event.raw;
  if (typeof raw !== 'object' || raw === null) {
    return undefined;
  }
  const field = event.source === 'ari' ? 'type' : 'Event';
  const value: unknown = Reflect.get(raw, field);
  return typeof value === 'string' ? value : undefined;
}

/** Digits come from exactly one feed, so a key press is never counted twice. */
export function isDtmfFromOtherFeed(event: RawPbxEvent, dtmfSource: DtmfSource): boolean {
  const type = rawEventType(event);
  if (event.source === 'ari') {
    return type === 'ChannelDtmfReceived' && dtmfSource !== 'ari';
  }
  return type === 'DTMFEnd' && dtmfSource !== 'ami';
}

export function dialString(target: string, pstnEndpoint: string): string {
  // Already a channel (e.g. `PJSIP/alice`): dial as given.
  if (target.includes('/')) {
    return target;
  }
  return `PJSIP/${target}@${pstnEndpoint}`;
}

/**
 * Asterisk behind one PbxCommands / PbxEventSource pair: channel control over
 * ARI, origination, messaging and dialplan changes over AMI.
 */
export class AsteriskGateway implements PbxCommands, PbxEventSource {
  private readonly ari: GatewayCollaborators['ari'];
  private readonly ariEvents: PbxEventSource;
  private readonly ami: GatewayCollaborators['ami'];

  constructor(
    private readonly config: RuntimeConfig,
    collaborators?: GatewayCollaborators,
  ) {
    const asterisk = config.asterisk;
    const ariOptions = {
      host: asterisk.host,
      port: asterisk.ariPort,
      username: asterisk.ariUser,
      password: asterisk.ariPassword,
      app: asterisk.ariApp,
      secure: asterisk.ariSecure,
    };
    this.ari = collaborators?.ari ?? new AriClient({ ...ariOptions, timeoutMs: config.timeouts.commandMs });
    this.ariEvents = collaborators?.ariEvents ?? new AriEventStream(ariOptions);
    this.ami =
      collaborators?.ami ??
      new AmiClient({
        host: asterisk.host,
        port: asterisk.amiPort,
        username: asterisk.amiUser,
        password: asterisk.amiPassword,
        timeoutMs: config.timeouts.commandMs,
      });
  }

  public async start(sink: PbxEventSink): Promise<void> {
    const dtmfSource = this.config.asterisk.dtmfSource;
    const filtered: PbxEventSink = {
      onEvent: (event) => {
        if (isDtmfFromOtherFeed(event, dtmfSource)) {
          return;
        }
        sink.onEvent(event);
      },
      onTransportError: (source, error) => sink.onTransportError(source, error),
    };

    await this.ami.start(filtered);
    await this.ariEvents.start(filtered);
    log.info(
      { event: 'pbx_gateway_started', host: this.config.asterisk.host, ari_app: this.config.asterisk.ariApp, dtmf_source: dtmfSource },
      'pbx gateway started',
    );
  }

  public async stop(): Promise<void> {
    const results = await Promise.allSettled([this.ariEvents.stop(), this.ami.stop()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        log.warn({ err: result.reason, event: 'pbx_gateway_stop_failed' }, 'pbx gateway stop failed');
      }
    }
  }

  public answer(channelId: string): Promise<void> {
    return this.ari.answer(channelId);
  }

  public play(channelId: string, request: PlayRequest): Promise<void> {
    return this.ari.play(channelId, request);
  }

  public stopPlayback(playbackId: string): Promise<void> {
    return this.ari.stopPlayback(playbackId);
  }

  public controlPlayback(playbackId: string, operation: PlaybackControl): Promise<void> {
    return this.ari.controlPlayback(playbackId, operation);
  }

  public record(channelId: string, request: RecordRequest): Promise<void> {
    return this.ari.record(channelId, request);
  }

  public async hangup(channelId: string, reason?: string): Promise<void> {
    log.info({ event: 'pbx_hangup', channel_id: channelId, reason }, 'pbx hangup');
    await this.ari.hangup(channelId);
  }

  public async originate(request: OriginateRequest): Promise<void> {
    if (request.kind === 'text') {
      // Nothing to set up on the PBX; a conversation exists once we send.
      return;
    }

    const asterisk = this.config.asterisk;
    await this.ami.send({
      Action: 'Originate',
      ActionID: request.sessionId,
      ChannelId: request.sessionId,
      Channel: dialString(request.target, asterisk.pstnEndpoint),
      Application: 'Stasis',
      Data: `${asterisk.ariApp},${ORIGINATED_STASIS_ARG}`,
      CallerID: `${request.callerIdName} <${request.callerIdNumber}>`,
      Timeout: request.timeoutMs,
      Async: 'true',
    });
    log.info(
      { event: 'pbx_originate_requested', session_id: request.sessionId, target: request.target },
      'originate requested',
    );
  }

  public async sendText(request: SendTextRequest): Promise<void> {
    const asterisk = this.config.asterisk;
    await this.ami.send({
      Action: 'MessageSend',
      Destination: `pjsip:${asterisk.pstnEndpoint}/<sip:${request.to}@${asterisk.pstnGatewayHost}>`,
      From: `sip:${request.from}@${asterisk.pstnGatewayHost}`,
      Base64Body: Buffer.from(request.body, 'utf8').toString('base64'),
      Variable: [`Remote-Party-ID=<sip:${request.from}@${asterisk.pstnGatewayHost}>`],
    });
    log.info({ event: 'pbx_text_sent', to: request.to, body_length: request.body.length }, 'text sent');
  }

  public async registerExtension(number: string, kind: SessionKind): Promise<void> {
    const asterisk = this.config.asterisk;
    const entry =
      kind === 'voice'
        ? { Context: asterisk.callContext, Application: 'Stasis', ApplicationData: asterisk.ariApp }
        : {
            Context: asterisk.textContext,
            Application: 'UserEvent',
            ApplicationData: `${TEXT_USER_EVENT},From: \${MESSAGE(from)},To: \${MESSAGE(to)},Body: \${BASE64_ENCODE(\${MESSAGE(body)})}`,
          };

    await this.ami.send({
      Action: 'DialplanExtensionAdd',
      Extension: number,
      Priority: 1,
      Replace: 'yes',
      ...entry,
    });
    log.info({ event: 'pbx_extension_registered', number, kind, context: entry.Context }, 'extension registered');
  }
}
