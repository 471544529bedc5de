// Cipher suite selection for node:tls.

import { DEFAULT_CIPHERS } from "node:tls";

const AEAD = /GCM|CCM|CHACHA20[-_]POLY1305/i;

/**
 * Build the `ciphers` string for `tls.connect`.
 *
 * With `modernOnly`, suites that are not AEAD are dropped; exclusion
 * entries (`!RC4`, `-DES`) are kept. If nothing is left of an explicit
 * list, the AEAD suites of Node's default list are used.
 */
export function selectCiphers(cipherSuites: "default" | readonly string[], modernOnly: boolean): string {
  const suites = cipherSuites === "default" ? DEFAULT_CIPHERS.split(":") : [...cipherSuites];
  if (!modernOnly) return suites.join(":");

  const modern = suites.filter(isModern);
  if (modern.some((suite) => !isExclusion(suite))) return modern.join(":");

  return DEFAULT_CIPHERS.split(":").filter(isModern).join(":");
}

function isModern(suite: string): boolean {
  return isExclusion(suite) || AEAD.test(suite);
}

function isExclusion(suite: string): boolean {
  return suite.startsWith("!") || suite.startsWith("-");
}

/** Lowest protocol version to offer. */
export function minimumVersion(modernOnly: boolean): "TLSv1.2" | "TLSv1" {
  return modernOnly ? "TLSv1.2" : "TLSv1";
}
