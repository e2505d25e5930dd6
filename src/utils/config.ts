import { promises as fs, existsSync } from 'fs';
import path from 'path';
import os from 'os';
import {
  KnowledgeBaseConfig,
  KnowledgeBaseConfigInput,
  KnowledgeBaseConfigSchema,
} from '../types/config.js';
import { ValidationError, FileError } from './errors.js';

type PlainObject = Record<string, unknown>;

export class ConfigManager {
  private configPath: string;
  private configDir: string;

  constructor(customPath?: string) {
    const resolved = customPath ?? process.env['LAYOUTKB_CONFIG_PATH'];
    if (resolved) {
      this.configPath = path.resolve(resolved);
      this.configDir = path.dirname(this.configPath);
    } else {
      this.configDir = this.getDefaultConfigDir();
      this.configPath = path.join(this.configDir, 'config.json');
    }
  }

  /**
   * Get default configuration directory
   */
  private getDefaultConfigDir(): string {
    return path.join(os.homedir(), '.layoutkb');
  }

  getDefaultDatabasePath(): string {
    return path.join(this.configDir, 'knowledge-base.db');
  }

  getDefaultStorageRoot(): string {
    return path.join(this.configDir, 'blobs');
  }

  exists(): boolean {
    return existsSync(this.configPath);
  }

  /**
   * Load configuration from file, then overlay environment variables
   */
  async load(): Promise<KnowledgeBaseConfig> {
    let data: unknown = {};

    if (this.exists()) {
      try {
        const content = await fs.readFile(this.configPath, 'utf-8');
        data = JSON.parse(content);
      } catch (error) {
        if (error instanceof SyntaxError) {
          throw new ValidationError('Configuration file contains invalid JSON');
        }
        throw new FileError(`Failed to load configuration: ${String(error)}`);
      }
    } else if (!hasEnvironmentCredentials()) {
      throw new FileError('Configuration file not found. Run "layoutkb init" to create one.');
    }

    const merged = isPlainObject(data) ? mergeDeep(data, environmentOverrides()) : environmentOverrides();
    return this.validate(merged);
  }

  /**
   * Validate raw data and fill in path defaults
   */
  validate(data: unknown): KnowledgeBaseConfig {
    const result = KnowledgeBaseConfigSchema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${result.error.message}`);
    }

    const config = result.data;
    if (!config.database.path) {
      config.database.path = this.getDefaultDatabasePath();
    }
    if (!config.storage.root) {
      config.storage.root = this.getDefaultStorageRoot();
    }
    return config;
  }

  async save(config: KnowledgeBaseConfigInput): Promise<void> {
    const validated = this.validate(config);

    try {
      await fs.mkdir(this.configDir, { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(validated, null, 2), 'utf-8');
    } catch (error) {
      throw new FileError(`Failed to save configuration: ${String(error)}`);
    }
  }

  /**
   * Update specific configuration values
   */
  async update(updates: KnowledgeBaseConfigInput): Promise<void> {
    const current = await this.load();
    await this.save(mergeDeep(toPlainObject(current), toPlainObject(updates)));
  }

  getConfigPath(): string {
    return this.configPath;
  }

  getConfigDir(): string {
    return this.configDir;
  }
}

function hasEnvironmentCredentials(): boolean {
  return Boolean(process.env['OPENAI_API_KEY']);
}

/**
 * Environment variables that override values from the config file
 */
export function environmentOverrides(env: NodeJS.ProcessEnv = process.env): PlainObject {
  const overrides: PlainObject = {};
  const set = (keys: string[], value: string | undefined): void => {
    if (value === undefined || value.trim() === '') return;
    let cursor = overrides;
    keys.slice(0, -1).forEach((key) => {
      const next = cursor[key];
      if (isPlainObject(next)) {
        cursor = next;
      } else {
        const created: PlainObject = {};
        cursor[key] = created;
        cursor = created;
      }
    });
    const last = keys[keys.length - 1];
    if (last !== undefined) {
      cursor[last] = value.trim();
    }
  };

  set(['providers', 'openai', 'apiKey'], env['OPENAI_API_KEY']);
  set(['providers', 'openai', 'baseUrl'], env['OPENAI_BASE_URL']);
  set(['parsing', 'external', 'apiToken'], env['LAYOUTKB_EXTERNAL_PARSER_TOKEN']);
  set(['parsing', 'local', 'baseUrl'], env['LAYOUTKB_LOCAL_PARSER_URL']);
  set(['reranker', 'apiKey'], env['LAYOUTKB_RERANK_API_KEY']);
  set(['sparse', 'encoderUrl'], env['LAYOUTKB_SPARSE_ENCODER_URL']);
  set(['database', 'path'], env['LAYOUTKB_DATABASE_PATH']);
  return overrides;
}

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toPlainObject(value: object): PlainObject {
  return Object.fromEntries(Object.entries(value));
}

/**
 * Deep merge two objects; arrays and scalars from source win
 */
export function mergeDeep(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = mergeDeep(existing, value);
    } else if (isPlainObject(value)) {
      result[key] = mergeDeep({}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
