import { CairnErrno, CairnError } from './errors';
import { ObjectFormat } from './model';
import { isObjectFormat } from './Hasher';
import { encodeConfig, parseConfig } from './encoding/parseConfig';
import { encode } from './encoding/util';
import { errorToString } from './util';

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export const CURRENT_STORE_VERSION = '1';
export const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 6;

export function isCompressionLevel(value: number): value is CompressionLevel {
  return Number.isInteger(value) && value >= 0 && value <= 9;
}

/**
 * Read-only view over a parsed store `config` file.
 */
export class StoreConfig {
  private readonly _raw: Map<string, string[]>;

  constructor(raw?: Map<string, string[]>) {
    this._raw = raw ?? new Map<string, string[]>();
  }

  getString(name: string): string | undefined {
    const values = this._raw.get(name.toLowerCase());
    return values === undefined ? undefined : values[values.length - 1];
  }

  getNumber(name: string): number | undefined {
    const value = this.getString(name);
    if (value === undefined) {
      return undefined;
    }

    const number = Number(value);
    if (value.trim() === '' || Number.isNaN(number)) {
      throw new Error(`Config value '${name}' is not a valid number: '${value}'`);
    }

    return number;
  }

  get version(): string | undefined {
    return this.getString('cairn.version');
  }

  get objectFormat(): ObjectFormat {
    const value = this.getString('core.objectformat') ?? 'sha1';
    if (!isObjectFormat(value)) {
      throw new Error(`Unsupported object format '${value}'`);
    }

    return value;
  }

  get compressionLevel(): CompressionLevel {
    const value = this.getNumber('core.compression') ?? DEFAULT_COMPRESSION_LEVEL;
    if (!isCompressionLevel(value)) {
      throw new Error(`Compression level must be an integer between 0 and 9, found ${value}`);
    }

    return value;
  }

  /**
   * All typed settings at once. Throws if any of them holds an unusable value.
   */
  settings(): { objectFormat: ObjectFormat; compressionLevel: CompressionLevel } {
    return {
      objectFormat: this.objectFormat,
      compressionLevel: this.compressionLevel,
    };
  }
}

export function decodeConfig(binary: Uint8Array): StoreConfig {
  let config: StoreConfig;
  try {
    config = new StoreConfig(parseConfig(binary));
    config.settings();
  } catch (error) {
    throw new CairnError(CairnErrno.BadStore, `Invalid config: ${errorToString(error)}`);
  }

  return config;
}

export function createDefaultConfig(objectFormat: ObjectFormat, compressionLevel: CompressionLevel): Uint8Array {
  const text = encodeConfig(
    new Map([
      ['core.objectformat', objectFormat],
      ['core.compression', String(compressionLevel)],
      ['cairn.version', CURRENT_STORE_VERSION],
    ]),
    ['cairn object store', 'Objects live under objects/<first two hex digits>/<remaining hex digits>'],
  );
  return encode(text);
}

export function describeConfig(config: StoreConfig): string {
  return `version=${config.version ?? '?'} format=${config.objectFormat} compression=${config.compressionLevel}`;
}
