import { createHash } from 'crypto';

import { CairnErrno, CairnError } from './errors';
import { Hash, Kind, ObjectFormat } from './model';
import { encodeHeader } from './encoding/encodeObject';

const algorithms: { readonly [F in ObjectFormat]: { readonly name: string; readonly byteLength: number } } = {
  sha1: { name: 'sha1', byteLength: 20 },
  sha256: { name: 'sha256', byteLength: 32 },
};

export function isObjectFormat(value: string): value is ObjectFormat {
  return value === 'sha1' || value === 'sha256';
}

/**
 * Computes object digests. The digest covers the `"<kind> <length>\0"` header as well as the body,
 * so equal bytes stored as different kinds never share an identity.
 */
export class Hasher {
  readonly format: ObjectFormat;
  readonly byteLength: number;
  readonly hexLength: number;
  private readonly _algorithm: string;
  private readonly _pattern: RegExp;

  constructor(format: ObjectFormat = 'sha1') {
    const { name, byteLength } = algorithms[format];
    this.format = format;
    this.byteLength = byteLength;
    this.hexLength = byteLength * 2;
    this._algorithm = name;
    this._pattern = new RegExp(`^[0-9a-f]{${this.hexLength}}$`);
  }

  digest(kind: Kind, body: Uint8Array): Hash {
    return createHash(this._algorithm)
      .update(encodeHeader(kind, body.length))
      .update(body)
      .digest('hex');
  }

  /**
   * Digest of an already framed object (header and body).
   */
  digestRaw(raw: Uint8Array): Hash {
    return createHash(this._algorithm).update(raw).digest('hex');
  }

  isValidHash(hash: string): boolean {
    return this._pattern.test(hash);
  }

  validateHash(hash: string, details?: string): void {
    if (!this.isValidHash(hash)) {
      throw new CairnError(CairnErrno.InvalidHash, `Invalid hash '${hash}'${details ? ` (${details})` : ''}`);
    }
  }
}
