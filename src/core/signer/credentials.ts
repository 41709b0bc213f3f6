import * as crypto from 'crypto';
import * as fs from 'fs-extra';
import * as path from 'path';
import forge from 'node-forge';
import { SignerConfig } from '../../types';
import { ParameterError, errorMessage } from '../errors';

/** CLI에서 받은 서명자 옵션 */
export interface SignerParams {
  /** PKCS#12 키스토어 경로 */
  ks?: string;
  ksKeyAlias?: string;
  /** 비밀번호 지정자 (pass:, env:, file:) */
  ksPass?: string;
  keyPass?: string;
  /** 개인키 파일 (PEM 또는 DER) */
  key?: string;
  /** 인증서 파일 (PEM 또는 DER) */
  cert?: string;
  v1SignerName?: string;
}

const V1_SIGNER_NAME_MAX = 8;

/**
 * 비밀번호 지정자 해석
 *
 * @example
 * resolvePassword('pass:test-secret') // 'test-secret'
 * resolvePassword('env:KS_PASS') // process.env.KS_PASS
 * resolvePassword('file:/path/to/pass.txt') // 파일의 첫 줄
 */
export async function resolvePassword(
  spec: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  const separator = spec.indexOf(':');
  const kind = separator < 0 ? '' : spec.slice(0, separator);
  const value = separator < 0 ? '' : spec.slice(separator + 1);

  switch (kind) {
    case 'pass':
      return value;
    case 'env': {
      const fromEnv = env[value];
      if (fromEnv === undefined) {
        throw new ParameterError(`환경 변수가 없습니다: ${value}`);
      }
      return fromEnv;
    }
    case 'file': {
      let content: string;
      try {
        content = await fs.readFile(value, 'utf-8');
      } catch (error) {
        throw new ParameterError(`비밀번호 파일을 읽을 수 없습니다: ${value} (${errorMessage(error)})`);
      }
      return content.split(/\r?\n/)[0] ?? '';
    }
    default:
      throw new ParameterError(
        `비밀번호는 pass:<값>, env:<변수>, file:<경로> 형식이어야 합니다: ${spec.split(':')[0]}`
      );
  }
}

/**
 * V1 서명 파일 이름 정규화: 대문자, [A-Z0-9_-] 외 문자는 '_', 최대 8자
 */
export function toV1SignerName(raw: string): string {
  const name = raw
    .toUpperCase()
    .replace(/[^A-Z0-9_-]/g, '_')
    .slice(0, V1_SIGNER_NAME_MAX);
  if (name.length === 0) {
    throw new ParameterError('V1 서명자 이름이 비어 있습니다');
  }
  return name;
}

/**
 * 서명자 설정 로드 (PKCS#12 키스토어 또는 키 + 인증서 파일)
 */
export async function loadSignerConfig(params: SignerParams): Promise<SignerConfig> {
  if (params.ks && (params.key || params.cert)) {
    throw new ParameterError('--ks와 --key/--cert는 함께 쓸 수 없습니다');
  }
  if (params.ks) {
    return loadKeyStoreSigner(params.ks, params);
  }
  if (params.key && params.cert) {
    return loadKeyAndCertSigner(params.key, params.cert, params);
  }
  if (params.key || params.cert) {
    throw new ParameterError('--key와 --cert는 함께 지정해야 합니다');
  }
  throw new ParameterError('서명자 옵션이 없습니다 (--ks 또는 --key/--cert)');
}

async function readInput(filePath: string, what: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    throw new ParameterError(`${what} 파일을 읽을 수 없습니다: ${filePath} (${errorMessage(error)})`);
  }
}

function isPem(data: Buffer): boolean {
  return data.toString('latin1').includes('-----BEGIN ');
}

function forgeCertificateToDer(certificate: forge.pki.Certificate): Buffer {
  return Buffer.from(
    forge.asn1.toDer(forge.pki.certificateToAsn1(certificate)).getBytes(),
    'binary'
  );
}

/**
 * 개인키를 RSA로 한정하고, 개인키에 맞는 인증서를 체인 맨 앞으로 정렬
 */
function buildSignerConfig(
  name: string,
  privateKey: crypto.KeyObject,
  certificates: Buffer[]
): SignerConfig {
  if (privateKey.asymmetricKeyType !== 'rsa') {
    throw new ParameterError(`RSA 키만 지원합니다 (현재: ${privateKey.asymmetricKeyType ?? '알 수 없음'})`);
  }
  if (certificates.length === 0) {
    throw new ParameterError('인증서가 없습니다');
  }

  const publicKey = crypto.createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
  const matching = certificates.findIndex((der) => {
    const certKey = new crypto.X509Certificate(der).publicKey.export({ type: 'spki', format: 'der' });
    return certKey.equals(publicKey);
  });
  if (matching < 0) {
    throw new ParameterError('개인키와 일치하는 인증서가 없습니다');
  }
  const ordered = [certificates[matching], ...certificates.filter((_, i) => i !== matching)];

  return {
    name: toV1SignerName(name),
    privateKeyPem: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString(),
    certificates: ordered,
  };
}

async function loadKeyStoreSigner(ksPath: string, params: SignerParams): Promise<SignerConfig> {
  const data = await readInput(ksPath, '키스토어');
  if (!params.ksPass) {
    throw new ParameterError('--ks-pass가 필요합니다');
  }
  const storePassword = await resolvePassword(params.ksPass);
  const keyPassword = params.keyPass ? await resolvePassword(params.keyPass) : storePassword;

  let p12: forge.pkcs12.Pkcs12Pfx | undefined;
  let lastError: unknown;
  for (const password of new Set([storePassword, keyPassword])) {
    try {
      const asn1 = forge.asn1.fromDer(forge.util.createBuffer(data.toString('binary')));
      p12 = forge.pkcs12.pkcs12FromAsn1(asn1, password);
      break;
    } catch (error) {
      lastError = error;
    }
  }
  if (!p12) {
    throw new ParameterError(
      `키스토어를 열 수 없습니다 (PKCS#12만 지원, 비밀번호 확인): ${ksPath} (${errorMessage(lastError)})`
    );
  }

  const alias = params.ksKeyAlias;
  const bags = alias
    ? p12.getBags({ friendlyName: alias }).friendlyName ?? []
    : [
        ...(p12.getBags({ bagType: forge.pki.oids.pkcs8ShroudedKeyBag })[
          forge.pki.oids.pkcs8ShroudedKeyBag
        ] ?? []),
        ...(p12.getBags({ bagType: forge.pki.oids.keyBag })[forge.pki.oids.keyBag] ?? []),
      ];

  const keyBags = bags.filter((bag) => bag.key !== undefined);
  if (keyBags.length === 0) {
    throw new ParameterError(
      alias ? `키스토어에 별칭 '${alias}'의 개인키가 없습니다` : '키스토어에 개인키가 없습니다'
    );
  }
  if (keyBags.length > 1) {
    throw new ParameterError('키스토어에 개인키가 여러 개입니다. --ks-key-alias를 지정하세요');
  }
  const [keyBag] = keyBags;
  if (!keyBag.key) {
    throw new ParameterError('키스토어의 개인키를 읽을 수 없습니다');
  }

  const certificates = (
    p12.getBags({ bagType: forge.pki.oids.certBag })[forge.pki.oids.certBag] ?? []
  ).flatMap((bag) => (bag.cert ? [forgeCertificateToDer(bag.cert)] : []));

  let privateKey: crypto.KeyObject;
  try {
    privateKey = crypto.createPrivateKey(forge.pki.privateKeyToPem(keyBag.key));
  } catch (error) {
    throw new ParameterError(`키스토어의 개인키 형식을 지원하지 않습니다: ${errorMessage(error)}`);
  }

  const defaultName = alias ?? path.basename(ksPath).split('.')[0];
  return buildSignerConfig(params.v1SignerName ?? defaultName, privateKey, certificates);
}

async function loadKeyAndCertSigner(
  keyPath: string,
  certPath: string,
  params: SignerParams
): Promise<SignerConfig> {
  const keyData = await readInput(keyPath, '개인키');
  const passphrase = params.keyPass ? await resolvePassword(params.keyPass) : undefined;

  let privateKey: crypto.KeyObject;
  try {
    privateKey = isPem(keyData)
      ? crypto.createPrivateKey({ key: keyData, format: 'pem', passphrase })
      : createDerPrivateKey(keyData, passphrase);
  } catch (error) {
    throw new ParameterError(`개인키를 읽을 수 없습니다: ${keyPath} (${errorMessage(error)})`);
  }

  const certData = await readInput(certPath, '인증서');
  let certificates: Buffer[];
  if (isPem(certData)) {
    certificates = forge.pem
      .decode(certData.toString('latin1'))
      .filter((block) => block.type === 'CERTIFICATE')
      .map((block) => Buffer.from(block.body, 'binary'));
  } else {
    certificates = [certData];
  }
  for (const der of certificates) {
    try {
      new crypto.X509Certificate(der);
    } catch (error) {
      throw new ParameterError(`인증서를 읽을 수 없습니다: ${certPath} (${errorMessage(error)})`);
    }
  }

  const defaultName = path.basename(keyPath).split('.')[0];
  return buildSignerConfig(params.v1SignerName ?? defaultName, privateKey, certificates);
}

function createDerPrivateKey(der: Buffer, passphrase: string | undefined): crypto.KeyObject {
  try {
    return crypto.createPrivateKey({ key: der, format: 'der', type: 'pkcs8', passphrase });
  } catch {
    return crypto.createPrivateKey({ key: der, format: 'der', type: 'pkcs1' });
  }
}
