#!/usr/bin/env -S npx tsx
import { config as loadEnv } from "dotenv";
import { parseArgs } from "util";
import { loadConfig } from "./config";
import { buildPipeline } from "./core/PipelineBuilder";
import { PcmStreamAudioSource } from "./services/audio/PcmStreamAudioSource";
import { LoggingService } from "./services/logging/LoggingService";
import { SubtitlePipelineError, ErrorCodes, ErrorSeverity, toPipelineError } from "./utils/error";

// Usage: ffmpeg -i input -f s16le -ac 1 -ar 16000 - | live-subtitles [--device n]
async function main(): Promise<number> {
  loadEnv();

  const { values } = parseArgs({
    options: {
      "list-devices": { type: "boolean", default: false },
      device: { type: "string" },
    },
  });

  const config = loadConfig();
  const logger = LoggingService.create({
    level: config.logging.level,
    logDir: config.logging.dir,
  });

  const audioSource = new PcmStreamAudioSource({
    input: process.stdin,
    sampleRate: config.sampleRate,
    logger,
  });

  if (values["list-devices"]) {
    for (const device of await audioSource.listDevices()) {
      console.log(`${device.index}: ${device.name} (${device.channelCount}ch, ${device.sampleRate} Hz)`);
    }
    return 0;
  }

  const deviceIndex = values.device === undefined ? config.audioDeviceIndex : Number(values.device);
  if (!Number.isInteger(deviceIndex) || deviceIndex < 0) {
    throw new SubtitlePipelineError(
      `Invalid --device value: ${values.device}`,
      ErrorCodes.INVALID_CONFIG,
      ErrorSeverity.CRITICAL,
      { component: "cli" }
    );
  }

  const pipeline = buildPipeline(config, logger, { audioSource });
  let failed = false;
  pipeline.on("fatal", (error) => {
    failed = true;
    logger.warn("Pipeline hit a fatal error", { code: error.code });
  });

  if (!(await pipeline.start(deviceIndex))) {
    return 1;
  }

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
    audioSource.on("ended", () => resolve());
    pipeline.on("stateChanged", (_from, to) => {
      if (to === "stopped") {
        resolve();
      }
    });
  });

  const report = await pipeline.stop();
  logger.info("Session finished", {
    timedOut: report.timedOut,
    ...pipeline.getStats(),
  });
  return failed || report.timedOut.length > 0 ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    const wrapped = toPipelineError(
      error,
      "Unexpected failure",
      ErrorCodes.INVALID_STATE,
      ErrorSeverity.CRITICAL,
      { component: "cli" }
    );
    console.error(`${wrapped.code}: ${wrapped.message}`);
    process.exit(1);
  });
