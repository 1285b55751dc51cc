import express, { type Express, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";
import type { CallFlowController } from "../services/callFlowHandler";
import { validateTwilioSignature } from "../middlewares/twilioAuth";
import { renderApologyTwiml, renderTurnTwiml, type SupportedVoice } from "../utils/twiml-helper";
import { abs } from "../utils/url";

export interface VoiceRouteOptions {
  voice: SupportedVoice;
  validateSignatures: boolean;
  authToken: string;
  publicBaseUrl?: string;
}

// Twilio CallStatus values after which the call is gone
const ENDING_STATUSES = new Set(["completed", "busy", "failed", "no-answer", "canceled"]);

const callParamsSchema = z
  .object({
    CallSid: z.string().min(1),
    From: z.string().optional(),
    SpeechResult: z.string().optional(),
    Digits: z.string().optional(),
    CallStatus: z.string().optional(),
  })
  .passthrough();

type CallParams = z.infer<typeof callParamsSchema>;

export function registerVoice(app: Express, controller: CallFlowController, options: VoiceRouteOptions) {
  const actionUrl = abs("/api/voice/handle", options.publicBaseUrl);

  // Twilio posts application/x-www-form-urlencoded; parse before checking the signature
  const webhook: RequestHandler[] = [
    express.urlencoded({ extended: false, limit: "1mb" }),
    validateTwilioSignature({
      authToken: options.authToken,
      enabled: options.validateSignatures,
      publicBaseUrl: options.publicBaseUrl,
      voice: options.voice,
    }),
  ];

  const sendTwiml = (res: Response, xml: string) => res.type("text/xml").send(xml);

  const parseParams = (req: Request, res: Response): CallParams | undefined => {
    const parsed = callParamsSchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn("[VOICE] Rejected webhook without CallSid", parsed.error.issues);
      res.status(400);
      sendTwiml(res, renderApologyTwiml(options.voice));
      return undefined;
    }
    return parsed.data;
  };

  // Call start: greet the caller and open the first gather
  app.post("/api/voice/incoming", webhook, async (req: Request, res: Response) => {
    const params = parseParams(req, res);
    if (!params) return;

    try {
      console.log(`[VOICE] 📞 Incoming call ${params.CallSid} from ${params.From ?? "unknown"}`);
      const response = await controller.handleTurn({
        callId: params.CallSid,
        utterance: "",
        callerNumber: params.From,
        isCallStart: true,
      });
      sendTwiml(res, renderTurnTwiml(response, { voice: options.voice, actionUrl }));
    } catch (err) {
      console.error("[VOICE] ❌ /incoming failed", err);
      sendTwiml(res, renderApologyTwiml(options.voice));
    }
  });

  // One caller utterance or keypad entry per request (empty when the caller said nothing)
  app.post("/api/voice/handle", webhook, async (req: Request, res: Response) => {
    const params = parseParams(req, res);
    if (!params) return;

    try {
      const response = await controller.handleTurn({
        callId: params.CallSid,
        utterance: params.SpeechResult ?? "",
        digits: params.Digits,
        callerNumber: params.From,
      });
      sendTwiml(res, renderTurnTwiml(response, { voice: options.voice, actionUrl }));
    } catch (err) {
      console.error(`[VOICE] ❌ /handle failed for ${params.CallSid}`, err);
      controller.endCall(params.CallSid, "handler error");
      sendTwiml(res, renderApologyTwiml(options.voice));
    }
  });

  // Status callback: release the call's state once Twilio reports it finished
  app.post("/api/voice/status", webhook, async (req: Request, res: Response) => {
    const params = parseParams(req, res);
    if (!params) return;

    const status = params.CallStatus ?? "";
    console.log(`[VOICE] 📶 Status ${params.CallSid}: ${status || "(none)"}`);
    if (ENDING_STATUSES.has(status)) {
      await controller.handleTurn({ callId: params.CallSid, utterance: "", isCallEnd: true });
    }
    res.sendStatus(204);
  });
}
