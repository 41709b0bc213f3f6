import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import forge from 'node-forge';

/** bundletool build-apks에 넘기는 일회용 키스토어 정보 */
export interface KeystoreInfo {
  path: string;
  alias: string;
  password: string;
}

export const DISPOSABLE_KEY_ALIAS = 'default';
export const DISPOSABLE_KEY_PASSWORD = 'defaultpass';

const VALIDITY_YEARS = 30;

/**
 * APK Set 빌드용 PKCS#12 키스토어 생성 (RSA-2048, 자체 서명)
 *
 * 여기서 만든 서명은 최종 결과물에 남지 않습니다. 추출된 APK는 다시 서명되기 때문입니다.
 */
export async function createDisposableKeystore(filePath: string): Promise<KeystoreInfo> {
  const { privateKey } = crypto.generateKeyPairSync('rsa', { modulusLength: 2048 });
  const forgeKey = forge.pki.privateKeyFromPem(
    privateKey.export({ type: 'pkcs1', format: 'pem' }).toString()
  );

  const certificate = forge.pki.createCertificate();
  certificate.publicKey = forge.pki.setRsaPublicKey(forgeKey.n, forgeKey.e);
  certificate.serialNumber = `01${crypto.randomBytes(8).toString('hex')}`;
  certificate.validity.notBefore = new Date();
  certificate.validity.notAfter = new Date();
  certificate.validity.notAfter.setFullYear(
    certificate.validity.notBefore.getFullYear() + VALIDITY_YEARS
  );
  const subject = [{ name: 'commonName', value: 'Disposable Bundle Key' }];
  certificate.setSubject(subject);
  certificate.setIssuer(subject);
  certificate.sign(forgeKey, forge.md.sha256.create());

  const p12 = forge.pkcs12.toPkcs12Asn1(forgeKey, [certificate], DISPOSABLE_KEY_PASSWORD, {
    algorithm: '3des',
    friendlyName: DISPOSABLE_KEY_ALIAS,
    generateLocalKeyId: true,
  });

  await fs.ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, Buffer.from(forge.asn1.toDer(p12).getBytes(), 'binary'));
  return { path: filePath, alias: DISPOSABLE_KEY_ALIAS, password: DISPOSABLE_KEY_PASSWORD };
}
