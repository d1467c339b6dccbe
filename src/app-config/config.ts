import fs from 'fs-extra';
import path from 'path';
import InvalidConfigOption from '../common/errors/invalid-config-option';
import { DEFAULT_API_ENDPOINT } from '../harness/credential/credential.utils';
import LocalPaths from '../paths';

export const LOG_LEVELS = ['info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface HarnessConfigOptions {
  log_level: LogLevel;
  api_endpoint: string;
  probe_timeout: number;
}

const isLogLevel = (value: string): value is LogLevel => {
  return (LOG_LEVELS as readonly string[]).includes(value);
};

export default class HarnessConfig implements HarnessConfigOptions {
  private config_dir: string;
  log_level: LogLevel;
  api_endpoint: string;
  probe_timeout: number;

  constructor(config_dir: string, partial?: Partial<HarnessConfigOptions>) {
    this.config_dir = config_dir;

    // Set defaults
    this.log_level = 'info';
    this.api_endpoint = DEFAULT_API_ENDPOINT;
    this.probe_timeout = 10000;

    // Override defaults with input values
    if (partial?.log_level && isLogLevel(partial.log_level)) {
      this.log_level = partial.log_level;
    }
    if (partial?.api_endpoint) {
      this.api_endpoint = partial.api_endpoint.replace(/\/+$/, '');
    }
    if (typeof partial?.probe_timeout === 'number' && partial.probe_timeout >= 0) {
      this.probe_timeout = partial.probe_timeout;
    }
  }

  static isOption(option: string): option is keyof HarnessConfigOptions {
    return ['log_level', 'api_endpoint', 'probe_timeout'].includes(option);
  }

  getConfigDir(): string {
    return this.config_dir;
  }

  get(option: string): string {
    if (!HarnessConfig.isOption(option)) {
      throw new InvalidConfigOption(option);
    }
    return `${this[option]}`;
  }

  set(option: string, value: string): void {
    switch (option) {
      case 'log_level':
        if (!isLogLevel(value)) {
          throw new InvalidConfigOption(option, `must be one of: ${LOG_LEVELS.join(', ')}`);
        }
        this.log_level = value;
        break;
      case 'api_endpoint':
        if (!/^https?:\/\/\S+$/.test(value)) {
          throw new InvalidConfigOption(option, 'must be an http(s) URL');
        }
        this.api_endpoint = value.replace(/\/+$/, '');
        break;
      case 'probe_timeout': {
        const timeout = Number(value);
        if (!Number.isInteger(timeout) || timeout < 0) {
          throw new InvalidConfigOption(option, 'must be a whole number of milliseconds');
        }
        this.probe_timeout = timeout;
        break;
      }
      default:
        throw new InvalidConfigOption(option);
    }
  }

  save(): void {
    const config_file = path.join(this.config_dir, LocalPaths.CLI_CONFIG_FILENAME);
    fs.ensureDirSync(this.config_dir);
    fs.writeJSONSync(config_file, this.toJSON(), { spaces: 2 });
  }

  toJSON(): HarnessConfigOptions {
    return {
      log_level: this.log_level,
      api_endpoint: this.api_endpoint,
      probe_timeout: this.probe_timeout,
    };
  }
}
