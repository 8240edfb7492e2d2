import { describe, it, expect } from "vitest";
import { EnvelopeError } from "@/features/errors";
import {
  PLAIN_ENVELOPE,
  checksum,
  checksumHex,
  decodeIncomingLine,
  decrypt,
  encodeOutgoingLine,
  encrypt,
  prepareOutgoing,
  processIncoming,
  unwrap,
  verify,
  wrap,
} from "../envelope";

function flipAt(message: string, index: number): string {
  const replacement = message[index] === "0" ? "1" : "0";
  return message.slice(0, index) + replacement + message.slice(index + 1);
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof EnvelopeError) return error.code;
    throw error;
  }
  return undefined;
}

describe("checksum", () => {
  it("matches the CRC-16/CCITT-FALSE check value", () => {
    expect(checksum("123456789")).toBe(0x29b1);
    expect(checksumHex("123456789")).toBe("29B1");
  });

  it("returns the initial value for an empty body", () => {
    expect(checksum("")).toBe(0xffff);
  });

  it("pads to four uppercase hex digits", () => {
    expect(checksumHex("A")).toBe("B915");
    expect(checksumHex("A")).toMatch(/^[0-9A-F]{4}$/);
  });

  it("hashes UTF-8 bytes, not UTF-16 code units", () => {
    expect(checksum("ñ")).toBe(checksum(new Uint8Array([0xc3, 0xb1])));
  });
});

describe("wrap / verify", () => {
  const bodies = [
    "PONG",
    "DIST:200,SENT:1,BAD:1,ALR:0,GREEN:80,RED:120,PAUS:0",
    "OK SET GREEN 90",
    "",
  ];

  it("appends the checksum suffix", () => {
    expect(wrap("123456789")).toBe("123456789,CRC:29B1");
  });

  it("round-trips every body", () => {
    for (const body of bodies) {
      expect(verify(wrap(body))).toBe(body);
    }
  });

  it("accepts a lowercase checksum", () => {
    expect(verify("123456789,CRC:29b1")).toBe("123456789");
  });

  it("rejects any single-character change", () => {
    const wrapped = wrap("DIST:150,SENT:1");
    for (let i = 0; i < wrapped.length; i++) {
      const code = codeOf(() => verify(flipAt(wrapped, i)));
      expect(["IntegrityMismatch", "MalformedEnvelope"]).toContain(code);
    }
  });

  it("splits on the last delimiter", () => {
    expect(unwrap("A,CRC:1234,CRC:ABCD")).toEqual({ body: "A,CRC:1234", claimed: "ABCD" });
  });

  it("reports a missing suffix as malformed", () => {
    expect(codeOf(() => verify("DIST:150"))).toBe("MalformedEnvelope");
  });

  it("reports a wrong checksum as a mismatch", () => {
    expect(codeOf(() => verify("123456789,CRC:0000"))).toBe("IntegrityMismatch");
  });
});

describe("encrypt / decrypt", () => {
  it("is self-inverse", () => {
    for (const body of ["PING", "DIST:150,SENT:1,CRC:1A2B", "ñandú", ""]) {
      expect(decrypt(encrypt(body))).toBe(body);
    }
  });

  it("produces base64 that differs from the plaintext", () => {
    const encoded = encrypt("PING");
    expect(encoded).not.toBe("PING");
    expect(encoded).toMatch(/^[A-Za-z0-9+/]+=*$/);
  });

  it("rejects invalid base64", () => {
    expect(codeOf(() => decrypt("!!!"))).toBe("DecodeError");
  });
});

describe("processIncoming / prepareOutgoing", () => {
  it("round-trips with and without encryption", () => {
    for (const enc of [false, true]) {
      const result = processIncoming(prepareOutgoing("SET RED 150", enc), enc);
      expect(result).toEqual({ ok: true, value: "SET RED 150" });
    }
  });

  it("returns the failure instead of throwing", () => {
    const result = processIncoming("DIST:150", false);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("MalformedEnvelope");
  });

  it("fails a protected message read as plaintext", () => {
    const result = processIncoming(prepareOutgoing("PONG", true), false);
    expect(result.ok).toBe(false);
  });
});

describe("line codec", () => {
  it("is the identity plus newline when both toggles are off", () => {
    expect(encodeOutgoingLine("PING", PLAIN_ENVELOPE)).toBe("PING\n");
    expect(decodeIncomingLine("PONG", PLAIN_ENVELOPE)).toEqual({ ok: true, value: "PONG" });
  });

  it("adds the checksum when integrity checking is on", () => {
    const options = { verifyCrc: true, encrypt: false };
    expect(encodeOutgoingLine("PING", options)).toBe(`PING,CRC:${checksumHex("PING")}\n`);
    expect(decodeIncomingLine(wrap("PONG"), options)).toEqual({ ok: true, value: "PONG" });
  });

  it("requires the suffix on every line when integrity checking is on", () => {
    const result = decodeIncomingLine("PONG", { verifyCrc: true, encrypt: false });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("MalformedEnvelope");
  });

  it("encrypts without a checksum when only encryption is on", () => {
    const options = { verifyCrc: false, encrypt: true };
    const line = encodeOutgoingLine("ALARM ON", options);
    expect(line).toBe(`${encrypt("ALARM ON")}\n`);
    expect(decodeIncomingLine(line.trimEnd(), options)).toEqual({ ok: true, value: "ALARM ON" });
  });
});
