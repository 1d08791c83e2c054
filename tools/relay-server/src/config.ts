import { RelayError } from 'keyrelay-core';

export interface RelayServerConfig {
  host: string;
  /** 0 picks a free port */
  port: number;
  reservationTimeoutMs: number;
  sweepIntervalMs: number;
  pendingQueueLimit: number;
  pendingTtlMs: number;
  highWatermarkBytes: number;
  /** Max size of one opaque blob (ciphertext, welcome, key package) */
  maxPayloadBytes: number;
  /** Max size of one HTTP JSON body */
  maxRequestBytes: number;
  excludeSender: boolean;
}

export const DEFAULT_CONFIG: Readonly<RelayServerConfig> = Object.freeze({
  host: '0.0.0.0',
  port: 4000,
  reservationTimeoutMs: 60 * 1000,
  sweepIntervalMs: 30 * 1000,
  pendingQueueLimit: 100,
  pendingTtlMs: 24 * 60 * 60 * 1000,
  highWatermarkBytes: 1024 * 1024,
  maxPayloadBytes: 256 * 1024,
  maxRequestBytes: 4 * 1024 * 1024,
  excludeSender: true,
});

type NumericKey = {
  [K in keyof RelayServerConfig]: RelayServerConfig[K] extends number ? K : never;
}[keyof RelayServerConfig];

interface NumericSetting {
  key: NumericKey;
  env: string;
  flag: string;
  /** Multiplier from the configured unit to the stored one */
  scale: number;
  min: number;
  max?: number;
}

const NUMERIC_SETTINGS: readonly NumericSetting[] = [
  { key: 'port', env: 'PORT', flag: 'port', scale: 1, min: 0, max: 65535 },
  { key: 'reservationTimeoutMs', env: 'RESERVATION_TIMEOUT_SECONDS', flag: 'reservation-timeout', scale: 1000, min: 1 },
  { key: 'sweepIntervalMs', env: 'SWEEP_INTERVAL_SECONDS', flag: 'sweep-interval', scale: 1000, min: 1 },
  { key: 'pendingQueueLimit', env: 'PENDING_QUEUE_LIMIT', flag: 'pending-limit', scale: 1, min: 1 },
  { key: 'pendingTtlMs', env: 'PENDING_TTL_SECONDS', flag: 'pending-ttl', scale: 1000, min: 1 },
  { key: 'highWatermarkBytes', env: 'HIGH_WATERMARK_BYTES', flag: 'high-watermark', scale: 1, min: 1 },
  { key: 'maxPayloadBytes', env: 'MAX_PAYLOAD_BYTES', flag: 'max-payload', scale: 1, min: 1 },
  { key: 'maxRequestBytes', env: 'MAX_REQUEST_BYTES', flag: 'max-request', scale: 1, min: 1 },
];

export const USAGE = `Usage: keyrelay-server [options]

Options (each also settable through the environment variable in brackets):
  --host <addr>                 bind address [HOST] (default ${DEFAULT_CONFIG.host})
  --port <n>                    listen port, 0 for any [PORT] (default ${DEFAULT_CONFIG.port})
  --reservation-timeout <s>     key package reservation window [RESERVATION_TIMEOUT_SECONDS] (default 60)
  --sweep-interval <s>          reservation sweep interval [SWEEP_INTERVAL_SECONDS] (default 30)
  --pending-limit <n>           offline frames kept per user [PENDING_QUEUE_LIMIT] (default 100)
  --pending-ttl <s>             offline frame lifetime [PENDING_TTL_SECONDS] (default 86400)
  --high-watermark <bytes>      per-socket outbound limit [HIGH_WATERMARK_BYTES] (default 1048576)
  --max-payload <bytes>         max opaque blob size [MAX_PAYLOAD_BYTES] (default 262144)
  --max-request <bytes>         max HTTP body size [MAX_REQUEST_BYTES] (default 4194304)
  --exclude-sender, --no-exclude-sender
                                skip the sending socket on fan-out [EXCLUDE_SENDER] (default true)
  --help                        show this help`;

/**
 * Build the server configuration from environment variables, then apply
 * command-line flags on top.
 * @throws RelayError INVALID_PAYLOAD naming the offending setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, argv: string[] = []): RelayServerConfig {
  const config: RelayServerConfig = { ...DEFAULT_CONFIG };
  const flags = parseFlags(argv);

  const host = flags.get('host') ?? env.HOST;
  if (host !== undefined) {
    if (host.trim().length === 0) throw invalid('HOST', host);
    config.host = host.trim();
  }

  for (const setting of NUMERIC_SETTINGS) {
    const fromFlag = flags.get(setting.flag);
    const raw = fromFlag ?? env[setting.env];
    if (raw === undefined || raw === '') continue;
    const name = fromFlag !== undefined ? `--${setting.flag}` : setting.env;
    config[setting.key] = parseInteger(name, raw, setting) * setting.scale;
  }

  const excludeFlag = flags.get('exclude-sender');
  const excludeRaw = excludeFlag ?? env.EXCLUDE_SENDER;
  if (excludeRaw !== undefined && excludeRaw !== '') {
    config.excludeSender = parseBoolean(excludeFlag !== undefined ? '--exclude-sender' : 'EXCLUDE_SENDER', excludeRaw);
  }

  return config;
}

function parseFlags(argv: string[]): Map<string, string> {
  const known = new Set(['host', 'exclude-sender', ...NUMERIC_SETTINGS.map((s) => s.flag)]);
  const flags = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new RelayError('INVALID_PAYLOAD', `unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    if (name === 'no-exclude-sender') {
      flags.set('exclude-sender', 'false');
      continue;
    }
    if (!known.has(name)) {
      throw new RelayError('INVALID_PAYLOAD', `unknown option: --${name}`);
    }
    if (name === 'exclude-sender' && eq === -1) {
      flags.set(name, 'true');
      continue;
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new RelayError('INVALID_PAYLOAD', `missing value for --${name}`);
    }
    flags.set(name, value);
  }
  return flags;
}

function parseInteger(name: string, raw: string, setting: NumericSetting): number {
  if (!/^\d+$/.test(raw.trim())) throw invalid(name, raw);
  const value = Number(raw.trim());
  if (!Number.isSafeInteger(value) || value < setting.min || (setting.max !== undefined && value > setting.max)) {
    throw invalid(name, raw);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw invalid(name, raw);
  }
}

function invalid(name: string, raw: string): RelayError {
  return new RelayError('INVALID_PAYLOAD', `invalid value for ${name}: "${raw}"`, { setting: name });
}
