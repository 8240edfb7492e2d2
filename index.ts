export * from "@/constants/protocol";
export * from "@/constants/timing";
export * from "@/features/errors";
export * from "@/features/config/app-config";
export * from "@/features/posture/reading";
export * from "@/features/protocol/envelope";
export * from "@/features/protocol/status-line";
export * from "@/features/protocol/commands";
export * from "@/features/link/transport";
export * from "@/features/link/serial-transport";
export * from "@/features/link/link-controller";
export * from "@/features/link/backoff";
export * from "@/features/link/auto-reconnect";
export * from "@/features/link/watchdog";
export * from "@/features/session/session-record";
export * from "@/features/session/session-engine";
export * from "@/features/state/event-hub";
export * from "@/features/state/change-feed";
export * from "@/features/state/rate-limiter";
export * from "@/features/storage/offline-buffer";
export * from "@/features/storage/remote-store";
export * from "@/features/storage/memory-store";
export * from "@/features/storage/firebase-store";
export * from "@/features/sync/sync-orchestrator";
export * from "@/features/monitor/posture-monitor";
