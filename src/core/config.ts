/**
 * Client configuration: defaults, option functions, validation and
 * environment loading
 */

import type { ChannelOptions } from '@grpc/grpc-js';
import { parseLogLevel, type LogLevel } from './logger';

const MiB = 1024 * 1024;

export interface ClientConfig {
  host: string;
  port: number;
  // Authentication token sent with every call (required)
  token: string;
  logLevel: LogLevel;
  useTls: boolean;
  // Applies to both send and receive
  maxMessageSize: number;
  initialWindowSize: number;
  initialConnWindowSize: number;
  writeBufferSize: number;
  readBufferSize: number;
  // Idle time before a keepalive ping is sent
  keepaliveTimeMs: number;
  // How long to wait for the ping to be acknowledged
  keepaliveTimeoutMs: number;
}

export type ConfigOption = (config: ClientConfig) => void;

export function defaultConfig(): ClientConfig {
  return {
    host: 'q.togomq.io',
    port: 5123,
    token: '',
    logLevel: 'info',
    useTls: true,
    maxMessageSize: 50 * MiB,
    initialWindowSize: 128 * MiB,
    initialConnWindowSize: 128 * MiB,
    writeBufferSize: 2 * MiB,
    readBufferSize: 2 * MiB,
    keepaliveTimeMs: 60_000,
    keepaliveTimeoutMs: 20_000,
  };
}

/**
 * Build a config from the defaults, applying options in order
 */
export function newConfig(...options: ConfigOption[]): ClientConfig {
  const config = defaultConfig();
  for (const option of options) {
    option(config);
  }
  return config;
}

export function withHost(host: string): ConfigOption {
  return (config) => {
    config.host = host;
  };
}

export function withPort(port: number): ConfigOption {
  return (config) => {
    config.port = port;
  };
}

export function withToken(token: string): ConfigOption {
  return (config) => {
    config.token = token;
  };
}

export function withLogLevel(level: LogLevel): ConfigOption {
  return (config) => {
    config.logLevel = level;
  };
}

export function withTls(useTls: boolean): ConfigOption {
  return (config) => {
    config.useTls = useTls;
  };
}

/**
 * Set the max message size. Both flow-control windows follow it unless
 * a later option sets them.
 */
export function withMaxMessageSize(size: number): ConfigOption {
  return (config) => {
    config.maxMessageSize = size;
    config.initialWindowSize = size;
    config.initialConnWindowSize = size;
  };
}

export function withInitialWindowSize(size: number): ConfigOption {
  return (config) => {
    config.initialWindowSize = size;
  };
}

export function withInitialConnWindowSize(size: number): ConfigOption {
  return (config) => {
    config.initialConnWindowSize = size;
  };
}

export function withWriteBufferSize(size: number): ConfigOption {
  return (config) => {
    config.writeBufferSize = size;
  };
}

export function withReadBufferSize(size: number): ConfigOption {
  return (config) => {
    config.readBufferSize = size;
  };
}

export function withKeepaliveTime(ms: number): ConfigOption {
  return (config) => {
    config.keepaliveTimeMs = ms;
  };
}

export function withKeepaliveTimeout(ms: number): ConfigOption {
  return (config) => {
    config.keepaliveTimeoutMs = ms;
  };
}

export const ConfigViolation = {
  HostEmpty: 'host cannot be empty',
  PortRange: 'port must be between 1 and 65535',
  TokenMissing: 'token is required',
  MaxMessageSize: 'max message size must be greater than 0',
  InitialWindowSize: 'initial window size must be greater than 0',
  InitialConnWindowSize: 'initial connection window size must be greater than 0',
  WriteBufferSize: 'write buffer size must be greater than 0',
  ReadBufferSize: 'read buffer size must be greater than 0',
  KeepaliveTime: 'keepalive time must be greater than 0',
  KeepaliveTimeout: 'keepalive timeout must be greater than 0',
} as const;

export type ConfigViolation = (typeof ConfigViolation)[keyof typeof ConfigViolation];

export class ConfigValidationError extends Error {
  constructor(public readonly violation: ConfigViolation) {
    super(violation);
    this.name = 'ConfigValidationError';
  }
}

// NaN fails these too
function isPositive(value: number): boolean {
  return value > 0;
}

/**
 * Validate configuration, throwing on the first violated invariant
 */
export function validateConfig(config: ClientConfig): void {
  const checks: Array<[boolean, ConfigViolation]> = [
    [config.host.trim() !== '', ConfigViolation.HostEmpty],
    [
      Number.isInteger(config.port) && config.port >= 1 && config.port <= 65535,
      ConfigViolation.PortRange,
    ],
    [config.token.trim() !== '', ConfigViolation.TokenMissing],
    [isPositive(config.maxMessageSize), ConfigViolation.MaxMessageSize],
    [isPositive(config.initialWindowSize), ConfigViolation.InitialWindowSize],
    [isPositive(config.initialConnWindowSize), ConfigViolation.InitialConnWindowSize],
    [isPositive(config.writeBufferSize), ConfigViolation.WriteBufferSize],
    [isPositive(config.readBufferSize), ConfigViolation.ReadBufferSize],
    [isPositive(config.keepaliveTimeMs), ConfigViolation.KeepaliveTime],
    [isPositive(config.keepaliveTimeoutMs), ConfigViolation.KeepaliveTimeout],
  ];

  for (const [ok, violation] of checks) {
    if (!ok) {
      throw new ConfigValidationError(violation);
    }
  }
}

export function configAddress(config: Pick<ClientConfig, 'host' | 'port'>): string {
  return `${config.host}:${config.port}`;
}

/**
 * gRPC channel options derived from the transport tuning values.
 * grpc-js honors the message limits, keepalive and the flow-control window;
 * the remaining http2 keys are passed through for other channel
 * implementations.
 */
export function channelOptions(config: ClientConfig): ChannelOptions {
  return {
    'grpc.max_send_message_length': config.maxMessageSize,
    'grpc.max_receive_message_length': config.maxMessageSize,
    'grpc-node.flow_control_window': config.initialConnWindowSize,
    'grpc.http2.lookahead_bytes': config.initialWindowSize,
    'grpc.http2.write_buffer_size': config.writeBufferSize,
    'grpc.http2.read_buffer_size': config.readBufferSize,
    'grpc.keepalive_time_ms': config.keepaliveTimeMs,
    'grpc.keepalive_timeout_ms': config.keepaliveTimeoutMs,
    'grpc.keepalive_permit_without_calls': 0,
  };
}

export interface EnvConfig {
  TOGOMQ_HOST?: string;
  TOGOMQ_PORT?: string;
  TOGOMQ_TOKEN?: string;
  TOGOMQ_LOG_LEVEL?: string;
  TOGOMQ_USE_TLS?: string;

  // Transport tuning
  TOGOMQ_MAX_MESSAGE_SIZE?: string;
  TOGOMQ_INITIAL_WINDOW_SIZE?: string;
  TOGOMQ_INITIAL_CONN_WINDOW_SIZE?: string;
  TOGOMQ_WRITE_BUFFER_SIZE?: string;
  TOGOMQ_READ_BUFFER_SIZE?: string;
  TOGOMQ_KEEPALIVE_TIME_MS?: string;
  TOGOMQ_KEEPALIVE_TIMEOUT_MS?: string;
}

/**
 * Build client config from environment variables
 */
export function configFromEnv(env: EnvConfig = process.env): ClientConfig {
  const options: ConfigOption[] = [];
  const num = (value: string | undefined, option: (n: number) => ConfigOption) => {
    if (value !== undefined && value !== '') {
      options.push(option(Number(value)));
    }
  };

  if (env.TOGOMQ_HOST) options.push(withHost(env.TOGOMQ_HOST));
  num(env.TOGOMQ_PORT, withPort);
  if (env.TOGOMQ_TOKEN) options.push(withToken(env.TOGOMQ_TOKEN));
  if (env.TOGOMQ_LOG_LEVEL) options.push(withLogLevel(parseLogLevel(env.TOGOMQ_LOG_LEVEL)));
  if (env.TOGOMQ_USE_TLS) {
    const disabled = ['false', '0', 'no'].includes(env.TOGOMQ_USE_TLS.trim().toLowerCase());
    options.push(withTls(!disabled));
  }

  // Max message size first so explicit window sizes override it
  num(env.TOGOMQ_MAX_MESSAGE_SIZE, withMaxMessageSize);
  num(env.TOGOMQ_INITIAL_WINDOW_SIZE, withInitialWindowSize);
  num(env.TOGOMQ_INITIAL_CONN_WINDOW_SIZE, withInitialConnWindowSize);
  num(env.TOGOMQ_WRITE_BUFFER_SIZE, withWriteBufferSize);
  num(env.TOGOMQ_READ_BUFFER_SIZE, withReadBufferSize);
  num(env.TOGOMQ_KEEPALIVE_TIME_MS, withKeepaliveTime);
  num(env.TOGOMQ_KEEPALIVE_TIMEOUT_MS, withKeepaliveTimeout);

  return newConfig(...options);
}
