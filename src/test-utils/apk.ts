import * as crypto from 'crypto';
import forge from 'node-forge';
import { SignerConfig } from '../types';
import { writeZip } from './zip';
import { ANDROID_MANIFEST_ENTRY } from '../core/signer/androidManifest';
import { ManifestFixture, buildBinaryManifest } from './axml';

export interface TestApkOptions extends ManifestFixture {
  /** 매니페스트 외에 넣을 엔트리 (이름 → 내용). resources.arsc와 .so는 무압축 */
  entries?: Record<string, string | Buffer>;
  /** 매니페스트를 넣지 않음 */
  withoutManifest?: boolean;
}

/**
 * 서명 테스트용 최소 APK (매니페스트, classes.dex, 리소스 몇 개)
 */
export async function createTestApk(filePath: string, options: TestApkOptions = {}): Promise<void> {
  const entries = options.entries ?? {
    'classes.dex': 'dex\n035\0test-classes',
    'res/layout/main.xml': '<LinearLayout/>',
    'resources.arsc': Buffer.alloc(64, 7),
  };

  const zipEntries = Object.entries(entries).map(([name, data]) => ({
    name,
    data: Buffer.isBuffer(data) ? data : Buffer.from(data, 'utf-8'),
    store: name === 'resources.arsc' || name.endsWith('.so'),
  }));
  if (!options.withoutManifest) {
    zipEntries.unshift({
      name: ANDROID_MANIFEST_ENTRY,
      data: buildBinaryManifest(options),
      store: false,
    });
  }
  await writeZip(filePath, zipEntries);
}

export interface TestSigner {
  config: SignerConfig;
  privateKey: crypto.KeyObject;
  certificate: Buffer;
}

/**
 * 테스트용 RSA 키와 자체 서명 인증서
 */
export function createTestSigner(name = 'TEST', commonName = 'Test Signer'): TestSigner {
  const { privateKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 2048 });
  const forgeKey = forge.pki.privateKeyFromPem(
    privateKey.export({ type: 'pkcs1', format: 'pem' }).toString()
  );

  const certificate = forge.pki.createCertificate();
  certificate.publicKey = forge.pki.setRsaPublicKey(forgeKey.n, forgeKey.e);
  certificate.serialNumber = '0a1b2c3d';
  certificate.validity.notBefore = new Date(Date.UTC(2020, 0, 1));
  certificate.validity.notAfter = new Date(Date.UTC(2050, 0, 1));
  const subject = [
    { name: 'commonName', value: commonName },
    { name: 'organizationName', value: 'Example' },
  ];
  certificate.setSubject(subject);
  certificate.setIssuer(subject);
  certificate.sign(forgeKey, forge.md.sha256.create());

  const der = Buffer.from(
    forge.asn1.toDer(forge.pki.certificateToAsn1(certificate)).getBytes(),
    'binary'
  );
  return {
    config: {
      name,
      privateKeyPem: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
      certificates: [der],
    },
    privateKey,
    certificate: der,
  };
}
