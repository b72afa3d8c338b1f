import type { Request, Response } from "express";
import Joi from "joi";
import logger from "../utils/logger";
import type { RecentMessageIds } from "../utils/message-cache";
import { extractUrl, isSupportedSource } from "../utils/url";
import type DownloadService from "../services/download.service";
import type { MessagingGateway } from "../services/messaging.service";
import type { WahaMessageEvent } from "../models/download.model";

export const HELP_MESSAGE = `👋 Welcome! Send me a YouTube or Facebook video link and I'll download it for you.

Supported platforms:
• 📺 YouTube
• 📘 Facebook

Examples:
• https://www.youtube.com/watch?v=...
• https://youtu.be/...
• https://www.facebook.com/...`;

export const UNSUPPORTED_MESSAGE = "❌ Please send a valid YouTube or Facebook video URL";

// Validation schemas
const envelopeSchema = Joi.object<{ event: string; session?: string; payload?: object }>({
  event: Joi.string().required(),
  session: Joi.string().optional(),
  payload: Joi.object().optional(),
}).unknown(true);

const messageEventSchema = Joi.object<WahaMessageEvent>({
  event: Joi.string().valid("message").required(),
  session: Joi.string().optional(),
  payload: Joi.object({
    id: Joi.string().optional(),
    from: Joi.string().min(1).required(),
    body: Joi.string().allow("").optional(),
    fromMe: Joi.boolean().optional(),
  })
    .unknown(true)
    .required(),
}).unknown(true);

export interface WebhookControllerDeps {
  verifyToken: string;
  downloads: DownloadService;
  messaging: MessagingGateway;
  recentMessages: RecentMessageIds;
}

export function createWebhookController(deps: WebhookControllerDeps) {
  const reply = async (recipient: string, text: string): Promise<void> => {
    try {
      await deps.messaging.send(recipient, { kind: "text", content: text });
    } catch (error) {
      logger.error(`Error replying to ${recipient}:`, error);
    }
  };

  async function verifyWebhook(req: Request, res: Response): Promise<void> {
    const mode = req.query["hub.mode"];
    const token = req.query["hub.verify_token"];
    const challenge = req.query["hub.challenge"];

    logger.info("Webhook verification attempt", { mode, hasToken: Boolean(token) });

    if (typeof mode !== "string" || typeof token !== "string") {
      res.status(400).end();
      return;
    }

    if (mode === "subscribe" && deps.verifyToken && token === deps.verifyToken) {
      logger.info("Webhook verified successfully");
      res
        .status(200)
        .type("text/plain")
        .send(typeof challenge === "string" ? challenge : "");
      return;
    }

    logger.warn("Invalid webhook verification token");
    res.status(403).end();
  }

  async function receiveWebhook(req: Request, res: Response): Promise<void> {
    try {
      const envelope = envelopeSchema.validate(req.body || {});
      if (envelope.error !== undefined) {
        res
          .status(400)
          .json({ error: "Invalid webhook body", details: envelope.error.message });
        return;
      }

      if (envelope.value.event !== "message") {
        logger.debug(`Ignoring webhook event ${envelope.value.event}`);
        res.status(200).json({ status: "ignored" });
        return;
      }

      const result = messageEventSchema.validate(req.body);
      if (result.error !== undefined) {
        res
          .status(400)
          .json({ error: "Invalid message payload", details: result.error.message });
        return;
      }
      const { payload } = result.value;

      if (payload.fromMe) {
        res.status(200).json({ status: "ignored" });
        return;
      }

      if (payload.id && deps.recentMessages.checkAndRemember(payload.id)) {
        logger.info("Duplicate message detected, skipping", { messageId: payload.id });
        res.status(200).json({ status: "duplicate" });
        return;
      }

      const text = payload.body ?? "";
      const url = extractUrl(text);

      if (!url) {
        await reply(payload.from, HELP_MESSAGE);
        res.status(200).json({ status: "ok" });
        return;
      }

      if (!isSupportedSource(url)) {
        logger.warn("Unsupported URL", { url });
        await reply(payload.from, UNSUPPORTED_MESSAGE);
        res.status(200).json({ status: "ok" });
        return;
      }

      logger.info("Processing URL", { from: payload.from, url });
      // runs past the webhook response; the outcome reaches the sender through the gateway
      deps.downloads.handle(payload.from, url).catch((error) => {
        logger.error(`Download request for ${url} failed:`, error);
      });

      res.status(200).json({ status: "ok" });
    } catch (error) {
      logger.error("Error in receiveWebhook controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  return { verifyWebhook, receiveWebhook };
}
