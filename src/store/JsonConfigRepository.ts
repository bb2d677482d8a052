/**
 * JSON file repository for the config document
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import { ConfigError, errorMessage } from '../errors.js';
import { extraSections, parseConfigDocument, serializeConfig } from './schema.js';
import { freezeConfig } from './snapshot.js';
import type { Config, ConfigRepository } from './types.js';

export class JsonConfigRepository implements ConfigRepository {
  private readonly filePath: string;
  private extras: Record<string, unknown> = {};

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /**
   * @throws ConfigError when the file is missing, not JSON, or invalid
   */
  public async load(): Promise<Config> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Invalid JSON in config file ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const config = freezeConfig(parseConfigDocument(raw));
    this.extras = extraSections(raw);
    return config;
  }

  /**
   * Write to a sibling temp file, then rename over the original.
   * Sections found on load that are not part of the config are written back unchanged.
   */
  public async save(config: Config): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    const body = JSON.stringify({ ...serializeConfig(config), ...this.extras }, null, 2) + '\n';
    await writeFile(tempPath, body, 'utf-8');
    await rename(tempPath, this.filePath);
  }
}
