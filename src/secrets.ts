import { generateKeyPairSync, randomBytes } from "node:crypto";
import { ProvisionError } from "./errors";
import type { GeneratedSecrets, VapidKeys } from "./types";

export const APP_SECRET_LENGTH = 128;

const EXCLUDED = /[/=+]/g;

/**
 * Random printable token of exactly `length` characters: base64 of CSPRNG
 * bytes with `/`, `=` and `+` stripped.
 */
export function generateToken(length: number): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Token length must be a positive integer, got ${length}`);
  }

  let out = "";
  try {
    while (out.length < length) {
      out += randomBytes(Math.max(32, length))
        .toString("base64")
        .replace(EXCLUDED, "");
    }
  } catch (err) {
    throw new ProvisionError("secret", "Could not read from the secure random source.", {
      cause: err,
      hint: "Check that the system entropy source is available, then re-run.",
    });
  }
  return out.slice(0, length);
}

/** Web Push (VAPID) keypair on P-256, raw key bytes in base64url. */
export function generateVapidKeys(): VapidKeys {
  let jwk: { d?: string; x?: string; y?: string };
  try {
    const { privateKey } = generateKeyPairSync("ec", { namedCurve: "prime256v1" });
    jwk = privateKey.export({ format: "jwk" });
  } catch (err) {
    throw new ProvisionError("secret", "Could not generate the VAPID keypair.", { cause: err });
  }

  if (!jwk.d || !jwk.x || !jwk.y) {
    throw new ProvisionError("secret", "Generated VAPID key is missing components.");
  }

  // uncompressed point: 0x04 || X || Y
  const publicPoint = Buffer.concat([
    Buffer.from([0x04]),
    Buffer.from(jwk.x, "base64url"),
    Buffer.from(jwk.y, "base64url"),
  ]);

  return {
    privateKey: jwk.d,
    publicKey: publicPoint.toString("base64url"),
  };
}

export function generateSecrets(): GeneratedSecrets {
  return {
    secretKeyBase: generateToken(APP_SECRET_LENGTH),
    otpSecret: generateToken(APP_SECRET_LENGTH),
    vapid: generateVapidKeys(),
  };
}
