import fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConfigLoadError } from '../config/loader.js';
import type { HostIdentity, HostKeyPolicy, TransportTarget } from './types.js';

export const DEFAULT_KNOWN_HOSTS_PATH = path.join(os.homedir(), '.ssh', 'known_hosts');

interface KnownHostEntry {
  hostnames: string[];
  key: string; // base64 encoded
}

/** Trusts every server. Each acceptance is reported through `onAccept`. */
export class AcceptAnyHostKeyPolicy implements HostKeyPolicy {
  readonly name = 'accept-any';

  constructor(private readonly onAccept?: (identity: HostIdentity) => void) {}

  verify(identity: HostIdentity): boolean {
    this.onAccept?.(identity);
    return true;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export function parseKnownHosts(raw: string): KnownHostEntry[] {
  const entries: KnownHostEntry[] = [];
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    if (trimmed.startsWith('@') || trimmed.startsWith('|')) {
      // cert-authority/revoked markers and hashed hostnames are not matched
      continue;
    }

    const [hostList, , key] = trimmed.split(/\s+/);
    if (!hostList || !key) {
      continue;
    }

    entries.push({
      hostnames: hostList.split(','),
      key,
    });
  }

  return entries;
}

export function buildHostCandidates(target: TransportTarget): string[] {
  const candidates = new Set<string>([`[${target.host}]:${target.port}`]);
  if (target.port === 22) {
    candidates.add(target.host);
  }
  return Array.from(candidates);
}

/** Pins server keys to the plain (unhashed) entries of an OpenSSH known_hosts file. */
export class KnownHostsPolicy implements HostKeyPolicy {
  readonly name = 'known-hosts';

  constructor(
    private readonly entries: readonly KnownHostEntry[],
    readonly sourcePath: string,
  ) {}

  static async fromFile(filePath: string = DEFAULT_KNOWN_HOSTS_PATH): Promise<KnownHostsPolicy> {
    const resolved = path.resolve(filePath);
    if (!(await fileExists(resolved))) {
      throw new ConfigLoadError(
        resolved,
        `Known hosts file not found at ${resolved}. Provide a valid path or disable strict host key checking.`,
      );
    }

    const entries = parseKnownHosts(await fs.readFile(resolved, 'utf-8'));
    if (entries.length === 0) {
      throw new ConfigLoadError(resolved, `No usable entries found in known hosts file ${resolved}`);
    }

    return new KnownHostsPolicy(entries, resolved);
  }

  verify(identity: HostIdentity): boolean {
    const candidates = buildHostCandidates(identity);
    const base64 = identity.key.toString('base64');
    return this.entries.some(
      (entry) => entry.key === base64 && entry.hostnames.some((name) => candidates.includes(name)),
    );
  }
}
