/**
 * Quran Stream Bot — src/index.ts
 * WHAT: Process entrypoint. Wires state, events and the control panel to a Discord client.
 * FLOWS:
 *  - boot: env → Sentry → scheduler + event bus + state store → login
 *  - ready: optional START_SURAH jump → post control panel → register with PanelManager
 *  - SIGINT/SIGTERM: panel manager → scheduler drain → client destroy → Sentry flush
 * DOCS:
 *  - discord.js v14 Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { Client, Events, GatewayIntentBits } from "discord.js";

import { env } from "./lib/env.js";
import { logger, redact } from "./lib/logger.js";
import { captureException, flushSentry, initializeSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
import { classifyError, errorContext } from "./lib/errors.js";
import { EventBus } from "./state/eventBus.js";
import { LoopScheduler } from "./state/scheduler.js";
import { StateStore } from "./state/stateStore.js";
import type { StateEventMap } from "./state/types.js";
import { PanelManager } from "./panel/panelManager.js";
import { postControlPanel } from "./panel/controlPanel.js";
import { findSurahFile, listAudioFiles } from "./audio/audioFiles.js";

initializeSentry({
  dsn: env.SENTRY_DSN,
  environment: env.SENTRY_ENVIRONMENT ?? env.NODE_ENV,
  tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,
});

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  captureException(error, { context: "uncaughtException", origin });
  // Give Sentry time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

async function main(): Promise<void> {
  const scheduler = new LoopScheduler();
  scheduler.start();

  const events = new EventBus<StateEventMap>();
  const store = new StateStore({ filePath: env.STATE_FILE, events, scheduler });
  store.incrementBotStartCount();

  const panelManager = new PanelManager({ events, updateTimeoutMs: env.PANEL_UPDATE_TIMEOUT_MS });

  const client = new Client({ intents: [GatewayIntentBits.Guilds] });

  const onReady = async (ready: Client<true>): Promise<void> => {
    logger.info({ evt: "client_ready", tag: ready.user.tag, id: ready.user.id }, "[startup] Bot ready");

    const files = listAudioFiles(env.AUDIO_DIR);
    logger.info(
      { evt: "audio_files_listed", dir: env.AUDIO_DIR, count: files.length, first: files[0] ? redact(files[0]) : null },
      "[startup] audio files listed"
    );

    if (env.START_SURAH) {
      const startSurah = Number(env.START_SURAH);
      if (files.length > 0 && !findSurahFile(files, startSurah)) {
        logger.warn(
          { evt: "start_surah_unavailable", startSurah, fileCount: files.length },
          "[startup] START_SURAH has no matching audio file"
        );
      }
      store.setCurrentSongIndexBySurah(startSurah, files);
    }

    if (!env.PANEL_CHANNEL_ID) {
      logger.info({ evt: "panel_disabled" }, "[startup] PANEL_CHANNEL_ID not set, no control panel");
      return;
    }

    const channel = await ready.channels.fetch(env.PANEL_CHANNEL_ID);
    if (!channel || !channel.isSendable()) {
      logger.warn(
        { evt: "panel_channel_unusable", channelId: env.PANEL_CHANNEL_ID },
        "[startup] panel channel not found or not a text channel"
      );
      return;
    }

    const panel = await postControlPanel(channel, ready, store, { trackCount: files.length });
    panelManager.register(panel);
  };

  client.once(Events.ClientReady, (ready) => {
    onReady(ready).catch((err: unknown) => {
      logger.error(
        { evt: "ready_handler_failed", ...errorContext(classifyError(err)), err },
        "[startup] ready handler failed"
      );
    });
  });

  // ===== Coordinated Graceful Shutdown =====
  let isShuttingDown = false;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
      return;
    }
    isShuttingDown = true;
    logger.info({ evt: "shutdown_start", signal }, "[shutdown] Graceful shutdown initiated");

    try {
      await panelManager.shutdown();

      scheduler.stop();
      await scheduler.drain();
      logger.debug("[shutdown] Scheduler drained");

      client.removeAllListeners();
      await client.destroy();
      logger.debug("[shutdown] Discord client destroyed");

      await flushSentry();
      logger.info({ evt: "shutdown_complete", signal }, "[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ evt: "shutdown_failed", err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
