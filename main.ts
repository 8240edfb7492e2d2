/**
 * posture-link command-line entry.
 *
 * Connects to the sensor (POSTURE_SERIAL_PATH or the first paired
 * HC-05/HC-06), mirrors readings to the remote store and prints notices.
 * Keys: p pause/resume, f finish session, r restart, t reset timer,
 * s statistics, q quit.
 */

import readline from "node:readline";

import { loadAppConfig, type AppConfig } from "@/features/config/app-config";
import { errorMessage } from "@/features/errors";
import { LinkController } from "@/features/link/link-controller";
import { SerialLinkTransport } from "@/features/link/serial-transport";
import { PostureMonitor } from "@/features/monitor/posture-monitor";
import { distanceCm } from "@/features/posture/reading";
import { SessionEngine } from "@/features/session/session-engine";
import { formatDuration } from "@/features/session/session-record";
import { FirebaseRemoteStore, createFirebaseDatabase } from "@/features/storage/firebase-store";
import { MemoryRemoteStore } from "@/features/storage/memory-store";
import { OfflineReadingBuffer } from "@/features/storage/offline-buffer";
import type { RemoteStore } from "@/features/storage/remote-store";
import { SyncOrchestrator } from "@/features/sync/sync-orchestrator";

function createRemoteStore(config: AppConfig): RemoteStore {
  if (!config.firebase) {
    console.warn("[Main] No POSTURE_FIREBASE_DATABASE_URL set, keeping data in memory");
    return new MemoryRemoteStore();
  }
  return new FirebaseRemoteStore(createFirebaseDatabase(config.firebase));
}

export function createMonitor(config: AppConfig): PostureMonitor {
  const fixedPeer = config.serialPath
    ? { address: config.serialPath, name: config.serialPath }
    : undefined;
  const transport = new SerialLinkTransport({
    baudRate: config.baudRate,
    pinnedPeers: fixedPeer ? [fixedPeer] : [],
  });
  const link = new LinkController({ transport, envelope: config.envelope });
  const sync = new SyncOrchestrator({
    store: createRemoteStore(config),
    buffer: new OfflineReadingBuffer({ filePath: config.bufferFile }),
    ownerId: config.ownerId,
  });
  const session = new SessionEngine({
    sink: sync,
    ownerId: config.ownerId,
    alarmEnabled: config.alarmEnabled,
  });
  return new PostureMonitor({
    link,
    session,
    sync,
    fixedPeer,
    resumeAfterReconnect: config.resumeAfterReconnect,
  });
}

async function main(): Promise<void> {
  const config = loadAppConfig();
  const monitor = createMonitor(config);

  monitor.addEventListener((event) => {
    switch (event.type) {
      case "notice":
        console.log(`>> ${event.message}`);
        break;
      case "alarm":
        process.stdout.write("\u0007");
        break;
      case "stateChanged": {
        const s = event.state;
        const distance = s.reading ? `${distanceCm(s.reading)} cm` : "--";
        console.log(
          `[${s.connectionState}${s.isReconnecting ? ", reconnecting" : ""}] ` +
            `${s.seatedTime}${s.paused ? " (paused)" : ""} | ${s.postureState ?? "-"} | ` +
            `${distance} | alerts ${s.badPostureAlerts}`,
        );
        break;
      }
    }
  });

  monitor.start();

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    if (monitor.getState().sessionActive) await monitor.finalizeSession();
    await monitor.dispose();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error("[Main] Shutdown failed:", errorMessage(err));
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  if (process.stdin.isTTY) {
    readline.emitKeypressEvents(process.stdin);
    process.stdin.setRawMode(true);
    process.stdin.on("keypress", (_text: string, key: { name?: string; ctrl?: boolean }) => {
      if (key.ctrl && key.name === "c") return onSignal();
      handleKey(monitor, key.name ?? "").catch((err: unknown) => {
        console.error("[Main] Command failed:", errorMessage(err));
      });
      if (key.name === "q") onSignal();
    });
  }

  await monitor.connectDefault();
}

async function handleKey(monitor: PostureMonitor, name: string): Promise<void> {
  switch (name) {
    case "p":
      await monitor.togglePause();
      break;
    case "f":
      await monitor.finalizeSession();
      break;
    case "r":
      await monitor.restartSession();
      break;
    case "t":
      monitor.resetTimer();
      break;
    case "s": {
      const stats = await monitor.statistics();
      if (!stats.ok) {
        console.log(`>> Could not load statistics: ${stats.error.message}`);
        break;
      }
      const v = stats.value;
      console.log(
        `>> ${v.totalSessions} sessions, ${formatDuration(v.totalDurationMs)} total, ` +
          `avg ${formatDuration(v.averageDurationMs)}, ${v.averageAlerts.toFixed(1)} alerts/session`,
      );
      break;
    }
    default:
      break;
  }
}

main().catch((err: unknown) => {
  console.error("[Main] Fatal:", errorMessage(err));
  process.exit(1);
});
