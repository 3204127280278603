import { describe, it, expect, jest, beforeAll, afterEach } from '@jest/globals';
import {
  CertificateInspector,
  parseCertificateRecord,
} from '../../src/lib/core/certificate-inspector.js';
import type { CertificateStore } from '../../src/lib/types/collaborators.js';
import { setLogger } from '../../src/lib/utils/logger.js';
import { createTestCertificate, daysFrom, type TestCertificate } from '../helpers/certificates.js';
import { MemoryCertificateStore } from '../helpers/memory-store.js';

const NOW = new Date('2026-06-01T00:00:00.000Z');

describe('CertificateInspector', () => {
  let current: TestCertificate;
  let expired: TestCertificate;

  beforeAll(async () => {
    current = await createTestCertificate({
      commonName: 'Example.com',
      dnsNames: ['example.com', 'www.example.com'],
      notAfter: daysFrom(NOW, 30),
    });
    expired = await createTestCertificate({
      commonName: 'example.com',
      notBefore: daysFrom(NOW, -90),
      notAfter: daysFrom(NOW, -1),
    });
  });

  afterEach(() => {
    setLogger(undefined);
  });

  function inspect(store: CertificateStore, domain: string): Promise<boolean> {
    return new CertificateInspector(store, () => NOW).hasValidCertificate(domain);
  }

  it('accepts a current certificate stored with its key', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.com', current.bundle);

    await expect(inspect(store, 'example.com')).resolves.toBe(true);
  });

  it('matches subject alternative names case-insensitively', async () => {
    const store = new MemoryCertificateStore();
    store.put('WWW.Example.COM', current.bundle);

    await expect(inspect(store, 'WWW.Example.COM')).resolves.toBe(true);
  });

  it('accepts a bundle with the key before the certificate', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.com', `${current.privateKeyPem}\n${current.certificatePem}`);

    await expect(inspect(store, 'example.com')).resolves.toBe(true);
  });

  it('is false when nothing is stored', async () => {
    await expect(inspect(new MemoryCertificateStore(), 'example.com')).resolves.toBe(false);
  });

  it('is false without a private key', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.com', current.certificatePem);

    await expect(inspect(store, 'example.com')).resolves.toBe(false);
  });

  it('is false when the certificate names another domain', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.org', current.bundle);

    await expect(inspect(store, 'example.org')).resolves.toBe(false);
  });

  it('is false once the certificate has expired', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.com', expired.bundle);

    await expect(inspect(store, 'example.com')).resolves.toBe(false);
  });

  it('is false at the exact expiry instant', async () => {
    const store = new MemoryCertificateStore();
    store.put('example.com', current.bundle);

    const inspector = new CertificateInspector(store, () => daysFrom(NOW, 30));
    await expect(inspector.hasValidCertificate('example.com')).resolves.toBe(false);
  });

  it('is false for text that is not a certificate', async () => {
    const store = new MemoryCertificateStore();
    store.put(
      'example.com',
      '-----BEGIN CERTIFICATE-----\nbm90IGEgY2VydA==\n-----END CERTIFICATE-----\n' +
        current.privateKeyPem,
    );

    await expect(inspect(store, 'example.com')).resolves.toBe(false);
  });

  it('warns and returns false when the store fails', async () => {
    const warnings: string[] = [];
    setLogger((message) => warnings.push(message));
    const store: CertificateStore = {
      pathFor: async (domain) => `/certs/${domain}.pem`,
      exists: async () => true,
      read: jest.fn<CertificateStore['read']>(async () => {
        throw new Error('disk unavailable');
      }),
    };

    await expect(inspect(store, 'example.com')).resolves.toBe(false);
    expect(warnings).toEqual(['WARN: could not read certificate for example.com: disk unavailable']);
  });
});

describe('parseCertificateRecord', () => {
  it('collects the lower-cased CN and DNS names', async () => {
    const certificate = await createTestCertificate({
      commonName: 'Example.com',
      dnsNames: ['WWW.example.com'],
      notAfter: daysFrom(NOW, 10),
    });

    const record = parseCertificateRecord(certificate.bundle);

    expect(record.commonName).toBe('Example.com');
    expect(record.names).toEqual(['example.com', 'www.example.com']);
    expect(record.notAfter.toISOString()).toBe('2026-06-11T00:00:00.000Z');
    expect(record.hasPrivateKey).toBe(true);
  });

  it('reads names from the SAN extension alone', async () => {
    const certificate = await createTestCertificate({
      dnsNames: ['api.example.com'],
      notAfter: daysFrom(NOW, 10),
    });

    const record = parseCertificateRecord(certificate.certificatePem);

    expect(record.commonName).toBeUndefined();
    expect(record.names).toEqual(['api.example.com']);
    expect(record.hasPrivateKey).toBe(false);
  });

  it('throws when there is no certificate block', () => {
    expect(() => parseCertificateRecord('hello')).toThrow('No PEM certificate block found');
  });
});
