// TLS trust evaluation.
//
// The transport hands over the peer's trust object during the handshake;
// a caller-supplied policy decides whether to continue.

import { createHash } from "node:crypto";
import type { TrustVerdict } from "./transport.ts";
import { socketLog, type LogFn } from "./logging.ts";

/** Peer certificate chain plus the transport's own evaluation of it. */
export interface TrustObject {
  /** DER-encoded certificates, leaf first. */
  readonly certificateChain: readonly Uint8Array[];
  /** Name of the policy the chain was evaluated against, e.g. `SSL (irc.example.net)`. */
  readonly policyName: string;
  /** Whether the transport's CA evaluation accepted the chain. */
  readonly authorized: boolean;
  readonly authorizationError?: string;
}

/** Decides whether a handshake may continue. */
export type TrustPolicy = (trust: TrustObject) => boolean | Promise<boolean>;

/** Accept exactly what the platform trust store accepts. */
export const systemTrustPolicy: TrustPolicy = (trust) => trust.authorized;

/** Accept any certificate (explicit user override). */
export const acceptAnyTrustPolicy: TrustPolicy = () => true;

/** SHA-256 fingerprint of a DER certificate, lowercase hex. */
export function certificateFingerprint(der: Uint8Array): string {
  return createHash("sha256").update(der).digest("hex");
}

/**
 * Accept when the leaf certificate's SHA-256 fingerprint is pinned.
 * Fingerprints may be written with or without colons, in either case.
 */
export function pinnedCertificatePolicy(fingerprints: Iterable<string>): TrustPolicy {
  const pinned = new Set<string>();
  for (const fingerprint of fingerprints) {
    pinned.add(fingerprint.replace(/:/g, "").toLowerCase());
  }
  return (trust) => {
    const leaf = trust.certificateChain[0];
    if (leaf === undefined) return false;
    return pinned.has(certificateFingerprint(leaf));
  };
}

/** Accept when any policy accepts, tried in order. */
export function anyOfTrustPolicies(...policies: TrustPolicy[]): TrustPolicy {
  return async (trust) => {
    for (const policy of policies) {
      if (await policy(trust)) return true;
    }
    return false;
  };
}

/**
 * Retains the latest trust object and answers the transport's verification
 * callback with the policy's verdict, exactly once per evaluation.
 */
export class TrustVerifier {
  private trust: TrustObject | undefined;

  constructor(
    private readonly policy: TrustPolicy,
    private readonly log: LogFn = socketLog,
  ) {}

  /** The trust object of the latest handshake, if any. */
  get current(): TrustObject | undefined {
    return this.trust;
  }

  get certificateChain(): readonly Uint8Array[] | undefined {
    return this.trust?.certificateChain;
  }

  get policyName(): string | undefined {
    return this.trust?.policyName;
  }

  evaluate(trust: TrustObject, complete: TrustVerdict): void {
    this.trust = trust;

    let answered = false;
    const answer = (accepted: boolean): void => {
      if (answered) return;
      answered = true;
      this.log("trust verdict for %s: %s", trust.policyName, accepted ? "accepted" : "rejected");
      complete(accepted);
    };
    const fail = (error: unknown): void => {
      this.log("trust policy failed: %O", error);
      answer(false);
    };

    let verdict: boolean | Promise<boolean>;
    try {
      verdict = this.policy(trust);
    } catch (error) {
      queueMicrotask(() => fail(error));
      return;
    }
    Promise.resolve(verdict).then(answer, fail);
  }

  reset(): void {
    this.trust = undefined;
  }
}
