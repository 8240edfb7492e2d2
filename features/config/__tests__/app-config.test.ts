import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { loadAppConfig } from "../app-config";

describe("loadAppConfig", () => {
  const warn = () => vi.mocked(console.warn);

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses defaults for an empty environment", () => {
    expect(loadAppConfig({}, "/srv/posture")).toEqual({
      serialPath: null,
      baudRate: 9600,
      envelope: { verifyCrc: false, encrypt: false },
      ownerId: "local",
      bufferFile: "/srv/posture/offline_posture_buffer.json",
      alarmEnabled: true,
      resumeAfterReconnect: false,
      firebase: null,
    });
    expect(warn()).not.toHaveBeenCalled();
  });

  it("reads every setting", () => {
    const config = loadAppConfig(
      {
        POSTURE_SERIAL_PATH: "/dev/rfcomm0",
        POSTURE_BAUD_RATE: "115200",
        POSTURE_VERIFY_CRC: "on",
        POSTURE_ENCRYPTION: "TRUE",
        POSTURE_OWNER_ID: " user-1 ",
        POSTURE_BUFFER_FILE: "/var/lib/posture/buffer.json",
        POSTURE_ALARM: "0",
        POSTURE_RESUME_AFTER_RECONNECT: "yes",
        POSTURE_FIREBASE_DATABASE_URL: "https://example.invalid",
        POSTURE_FIREBASE_API_KEY: "test-secret",
      },
      "/srv/posture",
    );

    expect(config).toEqual({
      serialPath: "/dev/rfcomm0",
      baudRate: 115200,
      envelope: { verifyCrc: true, encrypt: true },
      ownerId: "user-1",
      bufferFile: "/var/lib/posture/buffer.json",
      alarmEnabled: false,
      resumeAfterReconnect: true,
      firebase: {
        databaseURL: "https://example.invalid",
        apiKey: "test-secret",
        projectId: undefined,
        appId: undefined,
      },
    });
  });

  it("resolves a relative buffer file against the working directory", () => {
    const config = loadAppConfig({ POSTURE_BUFFER_FILE: "data/buffer.json" }, "/srv/posture");
    expect(config.bufferFile).toBe("/srv/posture/data/buffer.json");
  });

  it("falls back with a warning on invalid values", () => {
    const config = loadAppConfig({ POSTURE_BAUD_RATE: "fast", POSTURE_ALARM: "maybe" }, "/");

    expect(config.baudRate).toBe(9600);
    expect(config.alarmEnabled).toBe(true);
    expect(warn().mock.calls).toEqual([
      ['[Config] POSTURE_BAUD_RATE="fast" is not a positive integer, using 9600'],
      ['[Config] POSTURE_ALARM="maybe" is not a boolean, using true'],
    ]);
  });

  it("rejects a zero baud rate", () => {
    expect(loadAppConfig({ POSTURE_BAUD_RATE: "0" }, "/").baudRate).toBe(9600);
  });
});
