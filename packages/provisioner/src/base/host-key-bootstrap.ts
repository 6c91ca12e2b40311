/**
 * Host Key Bootstrap
 *
 * Pre-generates the SSH host identity of a machine locally and injects it
 * through user data, so the very first connection is already pinned: no
 * trust-on-first-use prompt, no window where sshd advertises a key we did
 * not choose.
 */

import { generateKeyPairSync } from "node:crypto";
import { parseKey, parsePrivateKey } from "sshpk";
import { SSH_CLIENT_ALIVE_INTERVAL_SECONDS } from "@scratchfleet/core";

/** EC2 rejects user data above 16 KB (measured before base64 encoding) */
export const MAX_USER_DATA_BYTES = 16 * 1024;

const HOST_KEY_PATH = "/etc/ssh/ssh_host_ed25519_key";
const PUBLIC_KEY_TERMINATOR = "SCRATCHFLEET_HOST_PUBLIC_KEY";
const PRIVATE_KEY_TERMINATOR = "SCRATCHFLEET_HOST_PRIVATE_KEY";

export interface HostIdentity {
  /** RFC 4253 wire encoding of the public key */
  publicKeyBytes: Buffer;
  /** OpenSSH one-line form, e.g. `ssh-ed25519 AAAA...` */
  publicKeyText: string;
  /** OpenSSH PEM private key */
  privateKeyText: string;
}

export interface KnownHostsEntry {
  address: string;
  keyType: string;
  publicKeyBytes: Buffer;
}

/** Local failure while producing key material; always fatal */
export class HostIdentityError extends Error {
  constructor(message: string, readonly cause?: Error) {
    super(message);
    this.name = "HostIdentityError";
  }
}

/**
 * Generate a fresh ed25519 host keypair. Ed25519 keeps the private key small
 * enough to sit comfortably inside the user data size ceiling.
 */
export function generateHostIdentity(): HostIdentity {
  try {
    const { privateKey } = generateKeyPairSync("ed25519", {
      publicKeyEncoding: { type: "spki", format: "pem" },
      privateKeyEncoding: { type: "pkcs8", format: "pem" },
    });
    const key = parsePrivateKey(privateKey, "pkcs8");
    const publicKey = key.toPublic();

    return {
      publicKeyBytes: publicKey.toBuffer("rfc4253"),
      publicKeyText: stripComment(publicKey.toString("ssh")),
      privateKeyText: key.toString("openssh").trimEnd(),
    };
  } catch (error) {
    throw new HostIdentityError(
      "Failed to generate SSH host identity",
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Build the boot script that swaps in the pre-generated host key.
 *
 * sshd is stopped before either key file is touched and started only after
 * both are written. Re-running the script leaves the machine in the same state.
 */
export function buildBootScript(publicKeyText: string, privateKeyText: string): string {
  assertHeredocSafe(publicKeyText, PUBLIC_KEY_TERMINATOR);
  assertHeredocSafe(privateKeyText, PRIVATE_KEY_TERMINATOR);

  const keepAlive = `ClientAliveInterval ${SSH_CLIENT_ALIVE_INTERVAL_SECONDS}`;

  return [
    `#!/bin/bash`,
    `set -euo pipefail`,
    ``,
    `systemctl stop ssh`,
    ``,
    `cat > ${HOST_KEY_PATH}.pub <<'${PUBLIC_KEY_TERMINATOR}'`,
    publicKeyText,
    PUBLIC_KEY_TERMINATOR,
    `cat > ${HOST_KEY_PATH} <<'${PRIVATE_KEY_TERMINATOR}'`,
    privateKeyText,
    PRIVATE_KEY_TERMINATOR,
    `chmod 644 ${HOST_KEY_PATH}.pub`,
    `chmod 600 ${HOST_KEY_PATH}`,
    ``,
    `grep -qxF '${keepAlive}' /etc/ssh/sshd_config || echo '${keepAlive}' >> /etc/ssh/sshd_config`,
    ``,
    `systemctl start ssh`,
    ``,
  ].join("\n");
}

/**
 * Base64 user data for RunInstances.
 */
export function encodeUserData(script: string): string {
  const raw = Buffer.from(script, "utf8");
  if (raw.length > MAX_USER_DATA_BYTES) {
    throw new HostIdentityError(
      `Boot script is ${raw.length} bytes, EC2 accepts at most ${MAX_USER_DATA_BYTES}`,
    );
  }
  return raw.toString("base64");
}

/**
 * A known_hosts line pinning `address` to the injected host key.
 */
export function knownHostsLine(address: string, publicKeyText: string): string {
  if (!address || /\s/.test(address)) {
    throw new HostIdentityError(`Invalid known_hosts address: "${address}"`);
  }
  return `${address} ${stripComment(publicKeyText)}\n`;
}

export function parseKnownHostsLine(line: string): KnownHostsEntry {
  const [address, keyType, encoded] = line.trim().split(/\s+/);
  if (!address || !keyType || !encoded) {
    throw new HostIdentityError(`Malformed known_hosts line: "${line.trim()}"`);
  }

  const key = parseKey(`${keyType} ${encoded}`, "ssh");
  return { address, keyType, publicKeyBytes: key.toBuffer("rfc4253") };
}

function stripComment(publicKeyText: string): string {
  const [keyType, encoded] = publicKeyText.trim().split(/\s+/);
  if (!keyType || !encoded) {
    throw new HostIdentityError(`Malformed OpenSSH public key: "${publicKeyText}"`);
  }
  return `${keyType} ${encoded}`;
}

function assertHeredocSafe(text: string, terminator: string): void {
  if (text.split("\n").some((line) => line.trim() === terminator)) {
    throw new HostIdentityError(`Key material contains the heredoc terminator ${terminator}`);
  }
}
