import path from "node:path";
import * as dotenv from "dotenv";
import { MqttBus } from "./bus";
import { loadConfig, DEFAULT_CONFIG_PATH } from "./config";
import { SessionStateMachine } from "./session";
import {
  AudioCapture,
  AudioFrontEnd,
  checkRecorderInstalled,
  createPorcupineScorer,
  GoogleSpeechTranscriber,
} from "./wake";

// Load environment variables from the first .env found
const envPaths = [
  path.join(process.cwd(), ".env"),
  path.join(__dirname, "..", ".env"),
];

for (const envPath of envPaths) {
  const result = dotenv.config({ path: envPath });
  if (!result.error) {
    console.log("[Main] Loaded .env from:", envPath);
    break;
  }
}

async function main(): Promise<void> {
  console.log("[Main] ========================================");
  console.log("[Main] Voice session pipeline starting");
  console.log("[Main] ========================================");

  const config = loadConfig(process.env.ASSISTANT_CONFIG || DEFAULT_CONFIG_PATH);

  console.log(`[Main] Checking for ${config.audio.recordProgram} installation...`);
  if (!(await checkRecorderInstalled(config.audio.recordProgram))) {
    throw new Error(
      `${config.audio.recordProgram} is not installed. Please install it:\n` +
      "  macOS: brew install sox\n" +
      "  Ubuntu: sudo apt-get install sox"
    );
  }

  const bus = new MqttBus(config.mqtt);
  await bus.connect();

  const transcriber = new GoogleSpeechTranscriber({
    languageCode: config.transcription.languageCode,
    sampleRate: config.transcription.sampleRate,
    apiKey: config.secrets.googleSpeechApiKey,
  });
  await transcriber.initialize();

  const scorer = createPorcupineScorer({
    accessKey: config.secrets.picovoiceAccessKey ?? "",
    keyword: config.wakeWord.keyword,
    sensitivity: config.wakeWord.sensitivity,
    windowFrames: config.wakeWord.windowFrames,
  });

  const capture = new AudioCapture({
    sampleRate: config.audio.sampleRate,
    frameSamples: config.audio.frameSamples,
    device: config.audio.device,
    recordProgram: config.audio.recordProgram,
    maxRetries: config.audio.captureMaxRetries,
    retryDelay: config.audio.captureRetryDelay,
  });

  const sessionMachine = new SessionStateMachine({
    bus,
    topics: config.topics,
    config: config.session,
  });

  const frontEnd = new AudioFrontEnd({
    bus,
    topics: config.topics,
    source: capture,
    scorer,
    transcriber,
    audio: config.audio,
    wakeWord: config.wakeWord,
    denylist: config.transcription.denylist,
  });

  let shuttingDown = false;
  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("[Main] Shutting down...");

    // Capture device first, bus last
    frontEnd.stop();
    sessionMachine.stop();
    scorer.release();
    await transcriber.destroy();
    await bus.close();

    console.log("[Main] ✓ Stopped");
    process.exit(exitCode);
  };

  const onSignal = () => {
    shutdown(0).catch((error: unknown) => {
      console.error("[Main] Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  frontEnd.on("fatal", () => {
    shutdown(1).catch((error: unknown) => {
      console.error("[Main] Shutdown failed:", error);
      process.exit(1);
    });
  });

  sessionMachine.start();
  frontEnd.start();
}

main().catch((error: unknown) => {
  console.error("[Main] ✗ Failed to start:", error);
  process.exit(1);
});
