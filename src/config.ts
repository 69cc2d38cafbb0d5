import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  ASTERISK_HOST: z.string().min(1),
  ARI_PORT: positiveInt(8088),
  ARI_USER: z.string().min(1),
  ARI_PASSWORD: z.string().min(1),
  ARI_APP: z.preprocess(emptyToUndefined, z.string().min(1).default('dialog-runtime')),
  ARI_SECURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  AMI_PORT: positiveInt(5038),
  AMI_USER: z.string().min(1),
  AMI_PASSWORD: z.string().min(1),
  DTMF_SOURCE: z.preprocess(emptyToUndefined, z.enum(['ari', 'ami']).default('ari')),
  CALL_CONTEXT: z.preprocess(emptyToUndefined, z.string().min(1).default('dialog-incoming-calls')),
  TEXT_CONTEXT: z.preprocess(emptyToUndefined, z.string().min(1).default('dialog-incoming-texts')),
  PSTN_ENDPOINT: z.preprocess(emptyToUndefined, z.string().min(1).default('pstn')),
  PSTN_GATEWAY_HOST: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SYSTEM_PHONE_NUMBER: z.string().regex(/^\+?\d{3,15}$/, 'expected a dialable number'),
  SYSTEM_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('Dialog Runtime')),
  ADMIN_PHONE_NUMBER: z.preprocess(
    emptyToUndefined,
    z.string().regex(/^\+?\d{3,15}$/, 'expected a dialable number').optional(),
  ),
  TTS_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
  TTS_VOICE: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SOUNDS_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('/var/lib/asterisk/sounds')),
  TTS_SOUNDS_SUBDIR: z.preprocess(emptyToUndefined, z.string().min(1).default('tts')),
  COMMAND_TIMEOUT_MS: positiveInt(10_000),
  GATHER_TIMEOUT_MS: positiveInt(3_000),
  MENU_MAX_RETRIES: z.preprocess(emptyToUndefined, z.coerce.number().int().min(0).default(2)),
  MENU_RETRY_PROMPT: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('That option is not available. Please try again.'),
  ),
  RECORD_GRACE_MS: positiveInt(5_000),
  ORIGINATE_TIMEOUT_MS: positiveInt(45_000),
  ENDING_GRACE_MS: positiveInt(30_000),
  MAX_CONCURRENT_SESSIONS: positiveInt(50),
  HTTP_PORT: positiveInt(3000),
});

export type EnvInput = Record<string, string | undefined>;

export interface RuntimeConfig {
  asterisk: {
    host: string;
    ariPort: number;
    ariUser: string;
    ariPassword: string;
    ariApp: string;
    ariSecure: boolean;
    amiPort: number;
    amiUser: string;
    amiPassword: string;
    /** Which feed keypad digits are taken from; the other one is ignored. */
    dtmfSource: 'ari' | 'ami';
    callContext: string;
    textContext: string;
    pstnEndpoint: string;
    pstnGatewayHost: string;
  };
  identity: {
    phoneNumber: string;
    name: string;
    /** Default recipient of operator notifications. */
    adminNumber?: string;
  };
  tts: {
    url?: string;
    voice?: string;
    soundsDir: string;
    soundsSubdir: string;
  };
  timeouts: {
    commandMs: number;
    gatherMs: number;
    recordGraceMs: number;
    originateMs: number;
    endingGraceMs: number;
  };
  menu: {
    maxRetries: number;
    retryPrompt: string;
  };
  limits: {
    maxConcurrentSessions: number;
  };
  http: {
    port: number;
  };
}

/**
 * Builds the runtime configuration once from environment-style input.
 * The result is frozen and handed to the server and initiator explicitly.
 */
export function loadConfig(source: EnvInput = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid environment variables: ${issues}`);
  }

  const env = parsed.data;
  const config: RuntimeConfig = {
    asterisk: {
      host: env.ASTERISK_HOST,
      ariPort: env.ARI_PORT,
      ariUser: env.ARI_USER,
      ariPassword: env.ARI_PASSWORD,
      ariApp: env.ARI_APP,
      ariSecure: env.ARI_SECURE,
      amiPort: env.AMI_PORT,
      amiUser: env.AMI_USER,
      amiPassword: env.AMI_PASSWORD,
      dtmfSource: env.DTMF_SOURCE,
      callContext: env.CALL_CONTEXT,
      textContext: env.TEXT_CONTEXT,
      pstnEndpoint: env.PSTN_ENDPOINT,
      pstnGatewayHost: env.PSTN_GATEWAY_HOST ?? env.ASTERISK_HOST,
    },
    identity: {
      phoneNumber: env.SYSTEM_PHONE_NUMBER,
      name: env.SYSTEM_NAME,
      adminNumber: env.ADMIN_PHONE_NUMBER,
    },
    tts: {
      url: env.TTS_URL,
      voice: env.TTS_VOICE,
      soundsDir: env.SOUNDS_DIR,
      soundsSubdir: env.TTS_SOUNDS_SUBDIR,
    },
    timeouts: {
      commandMs: env.COMMAND_TIMEOUT_MS,
      gatherMs: env.GATHER_TIMEOUT_MS,
      recordGraceMs: env.RECORD_GRACE_MS,
      originateMs: env.ORIGINATE_TIMEOUT_MS,
      endingGraceMs: env.ENDING_GRACE_MS,
    },
    menu: {
      maxRetries: env.MENU_MAX_RETRIES,
      retryPrompt: env.MENU_RETRY_PROMPT,
    },
    limits: {
      maxConcurrentSessions: env.MAX_CONCURRENT_SESSIONS,
    },
    http: {
      port: env.HTTP_PORT,
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object' && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
