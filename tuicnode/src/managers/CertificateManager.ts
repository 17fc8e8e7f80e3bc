import fs from 'fs';
import { randomBytes } from 'crypto';
import * as x509 from '@peculiar/x509';
import { logger } from '../utils/logger';
import { CertificateError, describeError } from '../utils/errors';
import { writeFileAtomic } from '../utils/files';

x509.cryptoProvider.set(crypto);

const DAY_MS = 24 * 60 * 60 * 1000;

const SIGNING_ALGORITHM: EcKeyGenParams & EcdsaParams = {
  name: 'ECDSA',
  namedCurve: 'P-256',
  hash: 'SHA-256',
};

const KEY_IMPORT_ALGORITHM: EcKeyImportParams = {
  name: 'ECDSA',
  namedCurve: 'P-256',
};

export interface Certificate {
  certPem: string;
  keyPem: string;
  commonName: string;
  notBefore: Date;
  notAfter: Date;
}

export interface EnsureCertificateResult {
  certificate: Certificate;
  regenerated: boolean;
}

export interface CertificateManagerOptions {
  validityDays: number;
  clock?: () => Date;
}

export class CertificateManager {
  private validityDays: number;
  private clock: () => Date;

  constructor(options: CertificateManagerOptions) {
    this.validityDays = options.validityDays;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Reuses the key pair at `certPath`/`keyPath` while the certificate is
   * within its validity window, otherwise issues a new self-signed one for
   * `commonName` and overwrites both files.
   *
   * A reused certificate keeps the common name it was issued with, even when
   * it differs from `commonName`.
   */
  async ensure(certPath: string, keyPath: string, commonName: string): Promise<EnsureCertificateResult> {
    const now = this.clock();
    const existing = await this.loadExisting(certPath, keyPath);

    if (existing) {
      if (isValidAt(existing, now)) {
        logger.info('Certificate still valid, reusing it', {
          commonName: existing.commonName,
          notAfter: existing.notAfter.toISOString(),
        });
        return { certificate: existing, regenerated: false };
      }
      logger.info('Certificate expired, generating a new one', {
        notAfter: existing.notAfter.toISOString(),
      });
    } else {
      logger.info('No usable certificate found, generating a new one');
    }

    const certificate = await this.generate(commonName, now);
    await this.write(certificate, certPath, keyPath);
    logger.info('Certificate generated', {
      commonName,
      notAfter: certificate.notAfter.toISOString(),
    });

    return { certificate, regenerated: true };
  }

  private async loadExisting(certPath: string, keyPath: string): Promise<Certificate | null> {
    if (!fs.existsSync(certPath) || !fs.existsSync(keyPath)) {
      return null;
    }

    try {
      const [certPem, keyPem] = await Promise.all([
        fs.promises.readFile(certPath, 'utf-8'),
        fs.promises.readFile(keyPath, 'utf-8'),
      ]);
      const certificate = parseCertificate(certPem, keyPem);
      if (!(await keyMatchesCertificate(certificate))) {
        logger.warn('Private key does not belong to the existing certificate');
        return null;
      }
      return certificate;
    } catch (error) {
      logger.warn('Existing certificate or key is unreadable', { error: describeError(error) });
      return null;
    }
  }

  private async generate(commonName: string, now: Date): Promise<Certificate> {
    try {
      const keys = await crypto.subtle.generateKey(SIGNING_ALGORITHM, true, ['sign', 'verify']);
      const notAfter = new Date(now.getTime() + this.validityDays * DAY_MS);

      const cert = await x509.X509CertificateGenerator.createSelfSigned({
        // Leading 01 keeps the DER integer positive.
        serialNumber: `01${randomBytes(15).toString('hex')}`,
        name: `CN=${commonName}`,
        notBefore: now,
        notAfter,
        signingAlgorithm: SIGNING_ALGORITHM,
        keys,
      });

      const pkcs8 = await crypto.subtle.exportKey('pkcs8', keys.privateKey);

      return {
        certPem: cert.toString('pem'),
        keyPem: x509.PemConverter.encode(pkcs8, 'PRIVATE KEY'),
        commonName,
        notBefore: cert.notBefore,
        notAfter: cert.notAfter,
      };
    } catch (error) {
      throw new CertificateError(`Failed to generate certificate for ${commonName}: ${describeError(error)}`);
    }
  }

  /**
   * Key first, certificate last: reuse is decided by the certificate, so a
   * new certificate only lands once its key is in place.
   */
  private async write(certificate: Certificate, certPath: string, keyPath: string): Promise<void> {
    try {
      await writeFileAtomic(keyPath, certificate.keyPem, 0o600);
      await writeFileAtomic(certPath, certificate.certPem);
    } catch (error) {
      throw new CertificateError(`Failed to write certificate files: ${describeError(error)}`);
    }
  }
}

export function parseCertificate(certPem: string, keyPem: string): Certificate {
  const cert = new x509.X509Certificate(certPem);
  return {
    certPem,
    keyPem,
    commonName: extractCommonName(cert.subject),
    notBefore: cert.notBefore,
    notAfter: cert.notAfter,
  };
}

/**
 * True when the PEM private key is the one the certificate's public key was
 * derived from. Throws when the key cannot be parsed.
 */
export async function keyMatchesCertificate(certificate: Pick<Certificate, 'certPem' | 'keyPem'>): Promise<boolean> {
  const cert = new x509.X509Certificate(certificate.certPem);
  const [der] = x509.PemConverter.decode(certificate.keyPem);
  if (!der) {
    throw new CertificateError('No PEM block in private key');
  }

  const privateKey = await crypto.subtle.importKey('pkcs8', der, KEY_IMPORT_ALGORITHM, true, ['sign']);
  const publicKey = await crypto.subtle.importKey('spki', cert.publicKey.rawData, KEY_IMPORT_ALGORITHM, true, [
    'verify',
  ]);
  const [privateJwk, publicJwk] = await Promise.all([
    crypto.subtle.exportKey('jwk', privateKey),
    crypto.subtle.exportKey('jwk', publicKey),
  ]);

  return privateJwk.x !== undefined && privateJwk.x === publicJwk.x && privateJwk.y === publicJwk.y;
}

export function isValidAt(certificate: Pick<Certificate, 'notBefore' | 'notAfter'>, now: Date): boolean {
  const time = now.getTime();
  return certificate.notBefore.getTime() <= time && time < certificate.notAfter.getTime();
}

function extractCommonName(subject: string): string {
  const match = /(?:^|,\s*)CN=([^,]+)/.exec(subject);
  return match ? match[1] : '';
}
