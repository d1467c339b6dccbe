import axios, { AxiosInstance } from 'axios';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import LocalPaths from '../paths';
import HarnessConfig, { HarnessConfigOptions } from './config';

export default class AppService {
  config: HarnessConfig;
  version: string;
  private _http?: AxiosInstance;

  static create(config_dir: string, version: string): AppService {
    return new AppService(config_dir, version);
  }

  constructor(config_dir: string, version: string) {
    this.config = new HarnessConfig(config_dir);
    this.version = version;
    if (config_dir) {
      const config_file = path.join(config_dir, LocalPaths.CLI_CONFIG_FILENAME);
      if (fs.existsSync(config_file)) {
        const payload: Partial<HarnessConfigOptions> = fs.readJSONSync(config_file);
        this.config = new HarnessConfig(config_dir, payload);
      }
    }
  }

  saveConfig(): void {
    this.config.save();
  }

  // Client used for scope probes. Authorization is set per request, never on the instance
  get http(): AxiosInstance {
    if (!this._http) {
      this._http = axios.create({
        timeout: this.config.probe_timeout,
        headers: {
          'User-Agent': `update-harness/${this.version} ${os.platform()} ${os.type()}/${os.release()}`,
        },
      });
    }
    return this._http;
  }
}
