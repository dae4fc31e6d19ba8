import fs from 'node:fs/promises';
import path from 'node:path';

import ssh2 from 'ssh2';
import type { ParsedKey } from 'ssh2';

import { CredentialError } from '../transport/errors.js';
import type { CertificateMaterial, Credentials, PrivateKeyMaterial } from '../transport/types.js';

export const PASSPHRASE_ENV_VAR = 'REMOTE_EXEC_KEY_PASSPHRASE';

const CERTIFICATE_TYPE = /^(.+)-cert-v0[01]@openssh\.com$/;

export interface LoadCredentialsOptions {
  privateKeyPath: string;
  certificatePath?: string;
  /** Defaults to REMOTE_EXEC_KEY_PASSPHRASE when set. */
  passphrase?: string;
}

function readField(blob: Buffer, offset: number): number | null {
  if (offset + 4 > blob.length) {
    return null;
  }
  const end = offset + 4 + blob.readUInt32BE(offset);
  return end <= blob.length ? end : null;
}

/** Key fields of an SSH public key blob: everything after the leading type string. */
function publicKeyFields(blob: Buffer): Buffer | null {
  const afterType = readField(blob, 0);
  return afterType === null ? null : blob.subarray(afterType);
}

/** Key fields of an OpenSSH certificate blob start after the type and nonce strings. */
function certifiedKeyFields(blob: Buffer): Buffer | null {
  const afterType = readField(blob, 0);
  const afterNonce = afterType === null ? null : readField(blob, afterType);
  return afterNonce === null ? null : blob.subarray(afterNonce);
}

function certifiesKey(certificate: ParsedKey, privateKey: ParsedKey): boolean {
  const expected = publicKeyFields(privateKey.getPublicSSH());
  const certified = certifiedKeyFields(certificate.getPublicSSH());
  if (!expected || !certified || certified.length < expected.length) {
    return false;
  }
  return certified.subarray(0, expected.length).equals(expected);
}

async function readKeyFile(filePath: string, label: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new CredentialError(filePath, `Failed to read ${label} at ${filePath}: ${error.message}`, {
      cause: error,
    });
  }
}

export async function loadPrivateKey(filePath: string, passphrase?: string): Promise<PrivateKeyMaterial> {
  const source = path.resolve(filePath);
  const data = await readKeyFile(source, 'private key');

  const parsed = ssh2.utils.parseKey(data, passphrase);
  if (parsed instanceof Error) {
    throw new CredentialError(source, `Cannot parse private key at ${source}: ${parsed.message}`, {
      cause: parsed,
    });
  }
  if (!parsed.isPrivateKey()) {
    throw new CredentialError(source, `${source} holds a public key; a private key is required`);
  }

  return { source, algorithm: parsed.type, key: parsed };
}

export async function loadCertificate(
  filePath: string,
  privateKey: PrivateKeyMaterial,
): Promise<CertificateMaterial> {
  const source = path.resolve(filePath);
  const data = await readKeyFile(source, 'certificate');

  const parsed = ssh2.utils.parseKey(data);
  if (parsed instanceof Error) {
    throw new CredentialError(source, `Cannot parse certificate at ${source}: ${parsed.message}`, {
      cause: parsed,
    });
  }

  const match = CERTIFICATE_TYPE.exec(parsed.type);
  if (!match) {
    throw new CredentialError(source, `${source} is not an OpenSSH certificate (type ${parsed.type})`);
  }
  if (match[1] !== privateKey.algorithm) {
    throw new CredentialError(
      source,
      `Certificate type ${parsed.type} does not match private key type ${privateKey.algorithm}`,
    );
  }

  if (!certifiesKey(parsed, privateKey.key)) {
    throw new CredentialError(
      source,
      `Certificate at ${source} was not issued for the private key at ${privateKey.source}`,
    );
  }

  return { source, certificateType: parsed.type, certificate: parsed };
}

/** Resolves key material from disk before any network activity happens. */
export async function loadCredentials(options: LoadCredentialsOptions): Promise<Credentials> {
  const passphrase = options.passphrase ?? process.env[PASSPHRASE_ENV_VAR];
  const privateKey = await loadPrivateKey(options.privateKeyPath, passphrase);

  if (!options.certificatePath) {
    return { privateKey };
  }

  const certificate = await loadCertificate(options.certificatePath, privateKey);
  return { privateKey, certificate };
}
