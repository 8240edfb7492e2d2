/**
 * Runtime configuration read from environment variables.
 */

import path from "node:path";

import { SerialConfig } from "@/constants/protocol";
import type { EnvelopeOptions } from "@/features/protocol/envelope";
import { DEFAULT_BUFFER_FILE } from "@/features/storage/offline-buffer";
import type { FirebaseStoreConfig } from "@/features/storage/firebase-store";

const TAG = "[Config]";

export interface AppConfig {
  /** Serial device to use instead of discovery, e.g. /dev/rfcomm0. */
  serialPath: string | null;
  baudRate: number;
  envelope: EnvelopeOptions;
  ownerId: string;
  bufferFile: string;
  alarmEnabled: boolean;
  /** Resume a connectivity-loss pause once the reconnected sensor answers PING. */
  resumeAfterReconnect: boolean;
  /** Null when no database URL is set; an in-process store is used instead. */
  firebase: FirebaseStoreConfig | null;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readFlag(env: Env, key: string, fallback: boolean): boolean {
  const value = readString(env, key);
  if (value === null) return fallback;
  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "on":
    case "yes":
      return true;
    case "0":
    case "false":
    case "off":
    case "no":
      return false;
    default:
      console.warn(`${TAG} ${key}="${value}" is not a boolean, using ${fallback}`);
      return fallback;
  }
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = readString(env, key);
  if (value === null) return fallback;
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    console.warn(`${TAG} ${key}="${value}" is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return Number(value);
}

export function loadAppConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const databaseURL = readString(env, "POSTURE_FIREBASE_DATABASE_URL");
  const bufferFile = readString(env, "POSTURE_BUFFER_FILE") ?? DEFAULT_BUFFER_FILE;

  return {
    serialPath: readString(env, "POSTURE_SERIAL_PATH"),
    baudRate: readPositiveInt(env, "POSTURE_BAUD_RATE", SerialConfig.BAUD_RATE),
    envelope: {
      verifyCrc: readFlag(env, "POSTURE_VERIFY_CRC", false),
      encrypt: readFlag(env, "POSTURE_ENCRYPTION", false),
    },
    ownerId: readString(env, "POSTURE_OWNER_ID") ?? "local",
    bufferFile: path.resolve(cwd, bufferFile),
    alarmEnabled: readFlag(env, "POSTURE_ALARM", true),
    resumeAfterReconnect: readFlag(env, "POSTURE_RESUME_AFTER_RECONNECT", false),
    firebase: databaseURL
      ? {
          databaseURL,
          apiKey: readString(env, "POSTURE_FIREBASE_API_KEY") ?? undefined,
          projectId: readString(env, "POSTURE_FIREBASE_PROJECT_ID") ?? undefined,
          appId: readString(env, "POSTURE_FIREBASE_APP_ID") ?? undefined,
        }
      : null,
  };
}
