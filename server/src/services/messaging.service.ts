import fs from "fs";
import axios, { type AxiosInstance } from "axios";
import logger from "../utils/logger";
import type { OutboundPayload } from "../models/download.model";
import { DeliveryError, errorMessage } from "../models/errors";

export interface MessagingGateway {
  send(recipient: string, payload: OutboundPayload): Promise<void>;
}

export interface WahaOptions {
  baseUrl: string;
  sessionName: string;
  apiKey?: string;
  timeoutMs?: number;
}

export function toChatId(recipient: string): string {
  return recipient.includes("@") ? recipient : `${recipient}@c.us`;
}

export function classifyDeliveryError(error: unknown): DeliveryError {
  if (error instanceof DeliveryError) return error;

  if (axios.isAxiosError(error) && error.response) {
    return new DeliveryError(
      "transport_rejected",
      `Gateway answered ${error.response.status}`,
      error.response.status,
    );
  }
  return new DeliveryError("recipient_unreachable", errorMessage(error));
}

/**
 * Client for the WAHA (WhatsApp HTTP API) gateway.
 */
export class WahaService implements MessagingGateway {
  private client: AxiosInstance;
  private sessionName: string;

  constructor(options: WahaOptions) {
    this.sessionName = options.sessionName;
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers: options.apiKey ? { "X-Api-Key": options.apiKey } : {},
      maxBodyLength: Infinity,
      maxContentLength: Infinity,
    });
    logger.info(`WAHA client initialized for ${options.baseUrl}`);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.client.get("/ping");
      return response.status === 200;
    } catch (error) {
      logger.warn(`WAHA health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async send(recipient: string, payload: OutboundPayload): Promise<void> {
    const chatId = toChatId(recipient);

    try {
      switch (payload.kind) {
        case "text":
          await this.client.post("/api/sendText", {
            chatId,
            text: payload.content,
            session: this.sessionName,
          });
          break;
        case "link":
          await this.client.post("/api/sendText", {
            chatId,
            text: payload.content.text,
            linkPreview: true,
            session: this.sessionName,
          });
          break;
        case "file": {
          const data = await fs.promises.readFile(payload.content.path);
          await this.client.post("/api/sendFile", {
            chatId,
            file: {
              mimetype: payload.content.mimetype,
              filename: payload.content.filename,
              data: data.toString("base64"),
            },
            caption: payload.content.caption,
            session: this.sessionName,
          });
          break;
        }
      }
      logger.info(`Sent ${payload.kind} message`, { chatId });
    } catch (error) {
      const classified = classifyDeliveryError(error);
      logger.warn(`Failed to send ${payload.kind} message to ${chatId}: ${classified.message}`, {
        kind: classified.kind,
      });
      throw classified;
    }
  }
}
