import { createPublicKey } from "node:crypto";
import { describe, expect, it } from "vitest";
import { APP_SECRET_LENGTH, generateSecrets, generateToken, generateVapidKeys } from "./secrets";

describe("generateToken", () => {
  it("returns exactly the requested length", () => {
    for (const length of [1, 16, 32, 43, 64, 128, 500]) {
      expect(generateToken(length)).toHaveLength(length);
    }
  });

  it("never contains /, = or +", () => {
    for (let i = 0; i < 50; i++) {
      expect(generateToken(128)).not.toMatch(/[/=+]/);
    }
  });

  it("only uses base64 alphanumerics", () => {
    expect(generateToken(256)).toMatch(/^[A-Za-z0-9]+$/);
  });

  it("does not repeat between calls", () => {
    expect(generateToken(64)).not.toBe(generateToken(64));
  });

  it("rejects non-positive or fractional lengths", () => {
    expect(() => generateToken(0)).toThrow(RangeError);
    expect(() => generateToken(-4)).toThrow(RangeError);
    expect(() => generateToken(2.5)).toThrow(RangeError);
  });
});

describe("generateVapidKeys", () => {
  it("produces a 32-byte private scalar and a 65-byte uncompressed point", () => {
    const { privateKey, publicKey } = generateVapidKeys();
    expect(Buffer.from(privateKey, "base64url")).toHaveLength(32);

    const point = Buffer.from(publicKey, "base64url");
    expect(point).toHaveLength(65);
    expect(point[0]).toBe(0x04);
  });

  it("emits a public key that is a valid P-256 point", () => {
    const { publicKey } = generateVapidKeys();
    const point = Buffer.from(publicKey, "base64url");
    const key = createPublicKey({
      key: {
        kty: "EC",
        crv: "P-256",
        x: point.subarray(1, 33).toString("base64url"),
        y: point.subarray(33).toString("base64url"),
      },
      format: "jwk",
    });
    expect(key.asymmetricKeyType).toBe("ec");
  });

  it("yields a fresh keypair each time", () => {
    expect(generateVapidKeys().privateKey).not.toBe(generateVapidKeys().privateKey);
  });
});

describe("generateSecrets", () => {
  it("fills every application secret", () => {
    const secrets = generateSecrets();
    expect(secrets.secretKeyBase).toHaveLength(APP_SECRET_LENGTH);
    expect(secrets.otpSecret).toHaveLength(APP_SECRET_LENGTH);
    expect(secrets.secretKeyBase).not.toBe(secrets.otpSecret);
    expect(secrets.vapid.publicKey).not.toBe("");
  });

  it("never reuses secrets across runs", () => {
    const a = generateSecrets();
    const b = generateSecrets();
    expect(a.secretKeyBase).not.toBe(b.secretKeyBase);
    expect(a.otpSecret).not.toBe(b.otpSecret);
    expect(a.vapid.privateKey).not.toBe(b.vapid.privateKey);
  });
});
