import type { NextFunction, Request, RequestHandler, Response } from 'express';
import twilio from 'twilio';
import { z } from 'zod';
import { renderApologyTwiml, type SupportedVoice } from '../utils/twiml-helper';

export interface TwilioSignatureOptions {
  authToken: string;
  /** When false every request passes (local development, tests) */
  enabled: boolean;
  /** Public origin Twilio signed against, when behind a proxy */
  publicBaseUrl?: string;
  voice: SupportedVoice;
}

const webhookParamsSchema = z.record(z.string(), z.string());

/**
 * Rejects webhook requests whose X-Twilio-Signature doesn't match.
 * Expects the urlencoded body to be parsed already.
 */
export function validateTwilioSignature(options: TwilioSignatureOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!options.enabled) return next();

    try {
      const signature = req.header('x-twilio-signature') ?? '';
      const fullUrl = options.publicBaseUrl
        ? `${options.publicBaseUrl.replace(/\/$/, '')}${req.originalUrl}`
        : `${req.protocol}://${req.get('host')}${req.originalUrl}`;

      const params = webhookParamsSchema.safeParse(req.body ?? {});
      const valid = params.success && twilio.validateRequest(options.authToken, signature, fullUrl, params.data);
      console.log('[SIGCHK]', { fullUrl, valid });

      if (!valid) {
        res
          .status(403)
          .type('text/xml')
          .send(renderApologyTwiml(options.voice, 'Sorry, we could not verify this call. Please try again later.'));
        return;
      }

      next();
    } catch (err) {
      console.error('[SIGCHK][ERROR]', err);
      res
        .type('text/xml')
        .send(renderApologyTwiml(options.voice, 'Sorry, there was a problem verifying your call.'));
    }
  };
}
