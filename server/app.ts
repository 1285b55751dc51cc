import express from "express";
import cors from "cors";
import { registerVoice, type VoiceRouteOptions } from "./routes/voice";
import type { CallFlowController } from "./services/callFlowHandler";

export interface AppDeps {
  controller: CallFlowController;
  voice: VoiceRouteOptions;
  nodeEnv?: string;
}

export function createApp({ controller, voice, nodeEnv = "development" }: AppDeps) {
  const app = express();

  // ----------------------------------------------------------------------------
  // 🔐 Twilio webhooks carry their own urlencoded parser + signature check,
  //    so they're mounted before the app-wide parsers.
  // ----------------------------------------------------------------------------
  registerVoice(app, controller, voice);

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));
  app.use(
    cors({
      origin: "*",
      methods: ["GET", "POST", "OPTIONS"],
    })
  );

  // Simple health check
  app.get("/health", (_req, res) => {
    res.status(200).json({ ok: true, env: nodeEnv, activeCalls: controller.activeCallCount });
  });

  app.get("/", (_req, res) => {
    res.type("text/plain").send("OK");
  });

  return app;
}
