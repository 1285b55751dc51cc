// server/index.ts
import path from "node:path";
import { createApp } from "./app";
import { env } from "./utils/env";
import { loadClinicConfig } from "./services/clinicConfig";
import { InMemoryAvailabilityResolver } from "./services/availability";
import { CallFlowController } from "./services/callFlowHandler";
import { createBackendFromEnv, createExtractor } from "./ai";

const config = loadClinicConfig(path.resolve(process.cwd(), env.CLINIC_CONFIG_PATH));

const controller = new CallFlowController({
  config,
  extractor: createExtractor({
    config,
    backend: createBackendFromEnv(env),
    timeoutMs: env.LLM_TIMEOUT_MS,
  }),
  resolver: new InMemoryAvailabilityResolver(config, { maxRangeDays: env.SEARCH_HORIZON_DAYS + 1 }),
  options: {
    retryBudget: env.DIALOGUE_RETRY_BUDGET,
    horizonDays: env.SEARCH_HORIZON_DAYS,
    inactivityMinutes: env.CALL_INACTIVITY_TIMEOUT_MINUTES,
    historyLimit: env.TURN_HISTORY_LIMIT,
  },
});

const isDev = env.NODE_ENV !== "production";
const skipValidation = isDev || env.DISABLE_TWILIO_VALIDATION;

const app = createApp({
  controller,
  nodeEnv: env.NODE_ENV,
  voice: {
    voice: env.PRIMARY_VOICE,
    validateSignatures: !skipValidation,
    authToken: env.TWILIO_AUTH_TOKEN,
    publicBaseUrl: env.PUBLIC_BASE_URL,
  },
});

// ----------------------------------------------------------------------------
// Boot
// ----------------------------------------------------------------------------
(async () => {
  try {
    const port = env.PORT;
    app.listen(port, () => {
      console.log(`[express] serving on port ${port}`);
      console.log(
        `[twilio] NODE_ENV=${env.NODE_ENV} | DISABLE_TWILIO_VALIDATION=${env.DISABLE_TWILIO_VALIDATION} | validate=${!skipValidation}`
      );
      console.log(`[twilio] Incoming webhook path: POST /api/voice/incoming`);
      console.log(`[twilio] Speech handler path:   POST /api/voice/handle`);
      console.log(`[twilio] Status callback path:  POST /api/voice/status`);
    });

    // Abandoned calls (no status callback) are dropped after the inactivity timeout
    const sweep = setInterval(() => controller.sweepInactive(), 60_000);
    sweep.unref();
  } catch (err) {
    console.error("Startup error:", err);
    process.exit(1);
  }
})();

// Safety logs
process.on("unhandledRejection", (reason) => {
  console.error("[unhandledRejection]", reason);
});
process.on("uncaughtException", (err) => {
  console.error("[uncaughtException]", err);
});

export default app;
