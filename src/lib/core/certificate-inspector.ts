/**
 * Certificate Validity Inspection
 *
 * Decides whether the locally stored certificate for a domain can still be
 * served. Absence and invalidity are expected outcomes and fold into
 * `false`; only the reason is logged.
 */

import { SubjectAlternativeNameExtension, X509Certificate } from '@peculiar/x509';
import type { CertificateStore } from '../types/collaborators.js';
import { debugCertificate } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';

const CERTIFICATE_PEM_PATTERN = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/;
const PRIVATE_KEY_PEM_PATTERN = /-----BEGIN ([A-Z]+ )?PRIVATE KEY-----/;

/**
 * What the inspector reads out of a stored certificate file
 */
export interface CertificateRecord {
  commonName?: string;
  /** Lower-cased subject CN followed by the SAN DNS names */
  names: string[];
  notAfter: Date;
  hasPrivateKey: boolean;
}

/**
 * Parse the first certificate in a PEM bundle.
 *
 * @throws {Error} When the text holds no parseable X.509 certificate
 */
export function parseCertificateRecord(pem: string): CertificateRecord {
  const block = CERTIFICATE_PEM_PATTERN.exec(pem);
  if (!block) {
    throw new Error('No PEM certificate block found');
  }

  const certificate = new X509Certificate(block[0]);
  const commonName = certificate.subjectName.getField('CN')[0];

  const names: string[] = [];
  if (commonName) {
    names.push(commonName);
  }

  const san = certificate.getExtension(SubjectAlternativeNameExtension);
  if (san) {
    for (const name of san.names.items) {
      if (name.type === 'dns') {
        names.push(name.value);
      }
    }
  }

  return {
    ...(commonName ? { commonName } : {}),
    names: names.map((name) => name.trim().toLowerCase()),
    notAfter: certificate.notAfter,
    hasPrivateKey: PRIVATE_KEY_PEM_PATTERN.test(pem),
  };
}

export class CertificateInspector {
  constructor(
    private readonly store: CertificateStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * True only when a stored, parseable, unexpired certificate for `domain`
   * exists together with its private key. Never throws.
   */
  async hasValidCertificate(domain: string): Promise<boolean> {
    let pem: string;
    try {
      const path = await this.store.pathFor(domain);
      if (!(await this.store.exists(path))) {
        debugCertificate('no certificate stored for %s', domain);
        return false;
      }
      pem = await this.store.read(path);
    } catch (error) {
      logWarn('could not read certificate for %s: %s', domain, describe(error));
      return false;
    }

    let record: CertificateRecord;
    try {
      record = parseCertificateRecord(pem);
    } catch (error) {
      debugCertificate('stored certificate for %s is not parseable: %s', domain, describe(error));
      return false;
    }

    if (!record.hasPrivateKey) {
      debugCertificate('stored certificate for %s has no private key', domain);
      return false;
    }

    if (!record.names.includes(domain.toLowerCase())) {
      debugCertificate('stored certificate names %j do not cover %s', record.names, domain);
      return false;
    }

    if (record.notAfter.getTime() <= this.now().getTime()) {
      debugCertificate(
        'stored certificate for %s expired at %s',
        domain,
        record.notAfter.toISOString(),
      );
      return false;
    }

    return true;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
