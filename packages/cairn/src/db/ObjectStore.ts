import * as fflate from 'fflate';
import { Errno, ISimpleFS, isFSError, Path } from '@cairn/simplefs';

import { Hash, Kind, ObjectFormat, RawObject } from './model';
import { Hasher } from './Hasher';
import {
  CairnErrno,
  CairnError,
  createDamagedObjectError,
  createHashMismatchError,
  createObjectNotFoundError,
} from './errors';
import {
  CompressionLevel,
  createDefaultConfig,
  CURRENT_STORE_VERSION,
  decodeConfig,
  DEFAULT_COMPRESSION_LEVEL,
  StoreConfig,
} from './config';
import { decodeFrame } from './encoding/decodeObject';
import { adler32 } from './encoding/util';
import { frameObject } from './encoding/encodeObject';
import { errorToString } from './util';

/**
 * Content-addressed persistence. Every other component talks to objects only through this interface,
 * holding digests rather than references.
 */
export interface IObjectStore {
  readonly hasher: Hasher;

  /**
   * Stores an object and returns its digest. Storing content that already exists is a no-op.
   */
  put(kind: Kind, body: Uint8Array): Promise<Hash>;

  /**
   * Throws `ObjectNotFound` when absent and `MalformedEncoding` when the persisted bytes cannot be read back.
   */
  get(hash: Hash): Promise<RawObject>;

  exists(hash: Hash): Promise<boolean>;
}

export interface StoreOptions {
  /**
   * Digest algorithm of a new store. When opening an existing store, it must match the store's config if given.
   */
  objectFormat?: ObjectFormat;

  /**
   * zlib level used for a new store. Existing stores keep the level in their config.
   */
  compressionLevel?: CompressionLevel;

  /**
   * Recompute the digest of every object returned by `get` and throw `HashMismatch` on difference.
   */
  verifyOnRead?: boolean;
}

export enum InitMode {
  Open,
  CreateIfNotExists,
}

// Two header bytes, at least one byte of deflate data, four trailer bytes
const ZLIB_MIN_LENGTH = 7;

const CONFIG_PATH = new Path('config');
const OBJECTS_PATH = new Path('objects');

/**
 * Object store laid out like git loose objects: `objects/<2 hex>/<rest>`, each file the zlib-compressed framed object.
 * Atomicity of individual objects is delegated to `ISimpleFS.write`.
 */
export class ObjectStore implements IObjectStore {
  private readonly _fs: ISimpleFS;
  private readonly _options: StoreOptions;
  private readonly _pendingWrites = new Map<Hash, Promise<void>>();
  private _config: StoreConfig | undefined;
  private _hasher: Hasher | undefined;
  private _compressionLevel: CompressionLevel = DEFAULT_COMPRESSION_LEVEL;

  constructor(fs: ISimpleFS, options?: StoreOptions) {
    this._fs = fs;
    this._options = options ?? {};
  }

  get hasher(): Hasher {
    return this._ensureInitialized();
  }

  get config(): StoreConfig {
    this._ensureInitialized();
    if (this._config === undefined) {
      throw new Error('Store config is not loaded');
    }

    return this._config;
  }

  async init(mode: InitMode = InitMode.Open): Promise<'init' | 'reInit'> {
    let binary: Uint8Array | undefined;
    try {
      binary = await this._fs.read(CONFIG_PATH);
    } catch (error) {
      if (!isFSError(error, Errno.ENOENT)) {
        throw error;
      }
    }

    if (binary !== undefined) {
      const config = decodeConfig(binary);
      if (config.version !== CURRENT_STORE_VERSION) {
        throw new CairnError(CairnErrno.BadStore, `Expected config variable 'cairn.version' == ${CURRENT_STORE_VERSION}, found '${config.version}'`);
      }

      const { objectFormat, compressionLevel } = config.settings();
      if (this._options.objectFormat !== undefined && this._options.objectFormat !== objectFormat) {
        throw new CairnError(CairnErrno.BadStore, `Store uses object format '${objectFormat}', '${this._options.objectFormat}' was requested`);
      }

      this._load(config, objectFormat, compressionLevel);
      return 'reInit';
    }

    if (mode !== InitMode.CreateIfNotExists) {
      throw new CairnError(CairnErrno.BadStore, 'Store is not initialized. Call init with mode CreateIfNotExists to create.');
    }

    if (await this._fs.directoryExists(OBJECTS_PATH)) {
      throw new CairnError(CairnErrno.BadStore, 'Store is partially initialized (objects without config). Fix manually');
    }

    const objectFormat = this._options.objectFormat ?? 'sha1';
    const compressionLevel = this._options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
    const newBinary = createDefaultConfig(objectFormat, compressionLevel);
    await this._fs.createDirectory(OBJECTS_PATH);
    await this._fs.write(CONFIG_PATH, newBinary);
    this._load(decodeConfig(newBinary), objectFormat, compressionLevel);
    return 'init';
  }

  async put(kind: Kind, body: Uint8Array): Promise<Hash> {
    const hasher = this._ensureInitialized();
    const raw = frameObject(kind, body);
    const hash = hasher.digestRaw(raw);

    // Concurrent puts of the same content share one write
    let pending = this._pendingWrites.get(hash);
    if (pending === undefined) {
      pending = this._writeIfAbsent(hash, raw).finally(() => this._pendingWrites.delete(hash));
      this._pendingWrites.set(hash, pending);
    }

    await pending;
    return hash;
  }

  async get(hash: Hash): Promise<RawObject> {
    const hasher = this._ensureInitialized();
    hasher.validateHash(hash);

    let compressed: Uint8Array;
    try {
      compressed = await this._fs.read(computeObjectPath(hash));
    } catch (error) {
      if (isFSError(error, Errno.ENOENT)) {
        throw createObjectNotFoundError(hash);
      }

      throw error;
    }

    let raw: Uint8Array;
    try {
      raw = inflate(compressed);
    } catch (error) {
      throw createDamagedObjectError(hash, errorToString(error));
    }

    let object: RawObject;
    try {
      object = decodeFrame(raw);
    } catch (error) {
      // Every frame put into the store hashes to its name
      const actual = hasher.digestRaw(raw);
      if (actual !== hash) {
        throw createHashMismatchError(hash, actual);
      }

      throw new CairnError(CairnErrno.MalformedEncoding, `Unreadable object: ${errorToString(error)}`).withObjectId(hash);
    }

    if (this._options.verifyOnRead) {
      const actual = hasher.digestRaw(raw);
      if (actual !== hash) {
        throw createHashMismatchError(hash, actual);
      }
    }

    return object;
  }

  async exists(hash: Hash): Promise<boolean> {
    const hasher = this._ensureInitialized();
    hasher.validateHash(hash);
    return await this._fs.fileExists(computeObjectPath(hash));
  }

  /**
   * All stored digests, sorted.
   */
  async listObjects(): Promise<Hash[]> {
    const hasher = this._ensureInitialized();
    if (!(await this._fs.directoryExists(OBJECTS_PATH))) {
      return [];
    }

    const hashes: Hash[] = [];
    for (const entry of await this._fs.list(OBJECTS_PATH, { recursive: true })) {
      if (entry.kind !== 'file' || entry.path.numSegments !== 3) {
        continue;
      }

      const [, prefix, rest] = entry.path.segments;
      const hash = prefix + rest;
      if (hasher.isValidHash(hash)) {
        hashes.push(hash);
      }
    }

    return hashes.sort();
  }

  private async _writeIfAbsent(hash: Hash, raw: Uint8Array): Promise<void> {
    const path = computeObjectPath(hash);
    if (await this._fs.fileExists(path)) {
      return;
    }

    const compressed = fflate.zlibSync(raw, { level: this._compressionLevel });
    await this._fs.write(path, compressed);
  }

  private _load(config: StoreConfig, objectFormat: ObjectFormat, compressionLevel: CompressionLevel) {
    this._config = config;
    this._hasher = new Hasher(objectFormat);
    this._compressionLevel = compressionLevel;
  }

  private _ensureInitialized(): Hasher {
    if (this._hasher === undefined) {
      throw new Error('Store is not initialized');
    }

    return this._hasher;
  }
}

/**
 * Inflates a zlib stream and checks its Adler-32 trailer, which `unzlibSync` leaves unchecked.
 */
function inflate(compressed: Uint8Array): Uint8Array {
  if (compressed.length < ZLIB_MIN_LENGTH) {
    throw new Error(`Truncated zlib stream of ${compressed.length} bytes`);
  }

  const raw = fflate.unzlibSync(compressed);
  const trailer = new DataView(compressed.buffer, compressed.byteOffset, compressed.byteLength).getUint32(compressed.length - 4);
  const checksum = adler32(raw);
  if (checksum !== trailer) {
    throw new Error(`Adler-32 checksum ${checksum.toString(16)} does not match trailer ${trailer.toString(16)}`);
  }

  return raw;
}

export function computeObjectPath(hash: Hash): Path {
  return new Path(`objects/${hash.substring(0, 2)}/${hash.substring(2)}`);
}
