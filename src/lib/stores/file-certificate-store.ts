import { access, readFile } from 'fs/promises';
import { join } from 'path';
import { CERTIFICATE_FILE_EXTENSION } from '../constants/defaults.js';
import type { CertificateStore } from '../types/collaborators.js';

export interface FileCertificateStoreOptions {
  /** Directory holding one PEM bundle (certificate + private key) per domain */
  directory: string;
  /** Maps a domain to its file name. Defaults to `<domain>.pem`, lower-cased. */
  fileName?: (domain: string) => string;
}

/**
 * Read-only certificate store over a directory of PEM bundles
 */
export class FileCertificateStore implements CertificateStore {
  private readonly directory: string;
  private readonly fileName: (domain: string) => string;

  constructor(opts: FileCertificateStoreOptions) {
    this.directory = opts.directory;
    this.fileName =
      opts.fileName ?? ((domain) => `${domain.toLowerCase()}${CERTIFICATE_FILE_EXTENSION}`);
  }

  /**
   * @throws {Error} When the mapped file name would leave the store directory
   */
  async pathFor(domain: string): Promise<string> {
    const name = this.fileName(domain);
    if (name.length === 0 || /[/\\]/.test(name) || name === '.' || name === '..') {
      throw new Error(`Invalid certificate file name for ${domain}: '${name}'`);
    }
    return join(this.directory, name);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async read(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }
}
