import logger from "../utils/logger";
import type { InFlightRegistry, Semaphore } from "../utils/concurrency";
import { normalizeUrl, parseAbsoluteUrl } from "../utils/url";
import type { RetrievalResult, RetrievalService } from "./retrieval.service";
import type { DeliveryResult, DeliveryRouter } from "./delivery.service";
import { type CloudStorage, classifyUploadError } from "./storage.service";
import type { MessagingGateway } from "./messaging.service";
import type { HistoryService } from "./history.service";
import type { RetentionService } from "./retention.service";
import { RequestStateMachine } from "../models/request-state";
import type {
  DeliveryOutcome,
  DeliveryPlan,
  DownloadRecord,
  DownloadRequest,
  DownloadStatus,
  FailureReason,
  OutboundPayload,
  RequestState,
  RetentionEntry,
  RetrievedMedia,
  UploadedArtifact,
} from "../models/download.model";
import {
  RetrievalError,
  type UploadError,
  ValidationError,
  errorMessage,
} from "../models/errors";

export type UploadOutcome =
  | { ok: true; artifact: UploadedArtifact }
  | { ok: false; error: UploadError };

/** Result shared by every request that joined the same in-flight URL. */
export type Preparation =
  | { ok: false; error: RetrievalError }
  | {
      ok: true;
      plan: DeliveryPlan;
      upload: UploadOutcome | null;
      retention: RetentionEntry | null;
    };

export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number;
}

export interface DownloadServiceDeps {
  retrieval: RetrievalService;
  router: DeliveryRouter;
  storage: CloudStorage;
  messaging: MessagingGateway;
  history: HistoryService;
  retention: RetentionService;
  inFlight: InFlightRegistry<string, Preparation>;
  limiter: Semaphore;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function failedStatus(reason: FailureReason): DownloadStatus {
  return `failed:${reason}`;
}

class DownloadService {
  private sleep: (ms: number) => Promise<void>;
  private pending = new Set<Promise<DeliveryOutcome>>();

  constructor(private readonly deps: DownloadServiceDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  createRequest(sender: string, url: string): DownloadRequest {
    if (typeof sender !== "string" || sender.trim() === "") {
      throw new ValidationError("sender must be a non-empty identifier");
    }
    if (typeof url !== "string" || !parseAbsoluteUrl(url.trim())) {
      throw new ValidationError(`Not an absolute http(s) URL: ${url}`);
    }
    return { sender: sender.trim(), url: url.trim(), requestedAt: new Date() };
  }

  /**
   * Runs one request to completion: shared retrieval and upload, per-sender
   * delivery, one terminal message, one history record. Only rejects on
   * invalid input.
   */
  async handle(sender: string, url: string): Promise<DeliveryOutcome> {
    const task = this.process(sender, url);
    this.pending.add(task);
    try {
      return await task;
    } finally {
      this.pending.delete(task);
    }
  }

  get inFlightCount(): number {
    return this.pending.size;
  }

  /** Waits until every request started so far has been recorded. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.allSettled(Array.from(this.pending));
    }
  }

  private async process(sender: string, url: string): Promise<DeliveryOutcome> {
    const request = this.createRequest(sender, url);
    const key = normalizeUrl(request.url);
    const machine = new RequestStateMachine();
    const move = (to: RequestState) => {
      machine.transition(to);
      logger.debug(`Request ${request.sender} -> ${to}`, { url: key });
    };

    let outcome: DeliveryOutcome;
    let media: RetrievedMedia | null = null;

    move("retrieving");
    try {
      const { promise, leader } = this.deps.inFlight.join(key, () => this.prepare(request.url));
      if (!leader) {
        logger.info("Joining in-flight download", { url: key, sender: request.sender });
      }
      const prepared = await promise;

      if (!prepared.ok) {
        move("retrieval_failed");
        outcome = await this.fail(request.sender, prepared.error.kind, null);
      } else {
        media = prepared.plan.media;
        move("retrieved");
        move("routing");
        outcome = await this.deliver(request.sender, prepared);
        move(outcome.status === "success" ? "delivered" : "delivery_failed");
      }
    } catch (error) {
      logger.error(`Unexpected error while handling ${key}:`, error);
      const state = machine.getState();
      if (state === "retrieving") {
        move("retrieval_failed");
        outcome = await this.fail(request.sender, "unknown", media);
      } else {
        if (state === "retrieved") move("routing");
        if (machine.getState() === "routing") move("delivery_failed");
        outcome = await this.fail(request.sender, "delivery_failed", media);
      }
    }

    const record: DownloadRecord = {
      sender: request.sender,
      url: request.url,
      title: media?.title ?? null,
      size: media?.size ?? null,
      duration: media?.duration ?? null,
      status: outcome.status,
      createdAt: request.requestedAt,
    };
    await this.deps.history.record(record);
    move("recorded");
    move("terminal");

    logger.info(`Download request finished: ${outcome.status}`, {
      sender: request.sender,
      url: request.url,
      inline: outcome.inlineDelivered,
      link: outcome.link !== null,
    });
    return outcome;
  }

  /**
   * Work shared by all joiners of one URL: retrieval, routing, upload and
   * retention registration.
   */
  private async prepare(url: string): Promise<Preparation> {
    let retrieved: RetrievalResult;
    try {
      retrieved = await this.retrieveWithRetry(url);
    } catch (error) {
      return { ok: false, error: new RetrievalError("unknown", errorMessage(error)) };
    }
    if (!retrieved.ok) {
      return retrieved;
    }

    const { media } = retrieved;
    const plan = this.deps.router.route(media);
    logger.info("Delivery planned", {
      url,
      size: media.size,
      actions: plan.actions,
    });

    let upload: UploadOutcome | null = null;
    if (plan.actions.includes("upload")) {
      try {
        upload = { ok: true, artifact: await this.deps.storage.upload(media.localPath) };
      } catch (error) {
        upload = { ok: false, error: classifyUploadError(error) };
      }
    }

    // upload has settled, so the local file can be scheduled for cleanup
    const retention = this.deps.retention.register({
      localPath: media.localPath,
      remoteRef: upload?.ok ? upload.artifact.remoteRef : undefined,
    });

    return { ok: true, plan, upload, retention };
  }

  private async retrieveWithRetry(url: string): Promise<RetrievalResult> {
    const { maxAttempts, backoffMs } = this.deps.retry;

    for (let attempt = 1; ; attempt++) {
      const result = await this.deps.limiter.run(() => this.deps.retrieval.fetch(url));
      if (result.ok || !result.error.isTransient() || attempt >= maxAttempts) {
        return result;
      }

      const delay = backoffMs * Math.pow(2, attempt - 1);
      logger.warn(
        `Retrieval attempt ${attempt}/${maxAttempts} failed (${result.error.kind}), retrying in ${delay}ms`,
        { url },
      );
      await this.sleep(delay);
    }
  }

  private async deliver(
    sender: string,
    prepared: Extract<Preparation, { ok: true }>,
  ): Promise<DeliveryOutcome> {
    const { plan, upload } = prepared;
    const { media } = plan;
    const result: DeliveryResult = {
      inlineAttempted: false,
      inlineDelivered: false,
      uploadAttempted: false,
      link: null,
    };

    for (const action of plan.actions) {
      if (action === "inline") {
        result.inlineAttempted = true;
        result.inlineDelivered = await this.trySend(
          sender,
          this.deps.router.inlinePayload(media),
        );
      } else {
        result.uploadAttempted = true;
        if (upload?.ok) {
          result.link = upload.artifact.url;
        } else if (upload) {
          logger.warn(`Upload failed (${upload.error.kind}), no link for ${sender}`, {
            detail: upload.error.message,
          });
        }
      }
    }

    if (!result.inlineDelivered && !result.link) {
      const reason: FailureReason =
        result.uploadAttempted && !result.inlineAttempted ? "upload_failed" : "delivery_failed";
      return this.fail(sender, reason, media);
    }

    const sent = await this.trySend(sender, this.deps.router.successPayload(plan, result));
    if (!sent && !result.inlineDelivered) {
      // the link was the only channel and it never arrived
      return this.outcome(failedStatus("delivery_failed"), media, false, null);
    }
    return this.outcome("success", media, result.inlineDelivered, result.link);
  }

  private async fail(
    sender: string,
    reason: FailureReason,
    media: RetrievedMedia | null,
  ): Promise<DeliveryOutcome> {
    await this.trySend(sender, this.deps.router.failurePayload(reason));
    return this.outcome(failedStatus(reason), media, false, null);
  }

  private async trySend(sender: string, payload: OutboundPayload): Promise<boolean> {
    try {
      await this.deps.messaging.send(sender, payload);
      return true;
    } catch (error) {
      logger.warn(`Could not send ${payload.kind} to ${sender}: ${errorMessage(error)}`);
      return false;
    }
  }

  private outcome(
    status: DownloadStatus,
    media: RetrievedMedia | null,
    inlineDelivered: boolean,
    link: string | null,
  ): DeliveryOutcome {
    return {
      status,
      title: media?.title ?? null,
      size: media?.size ?? null,
      inlineDelivered,
      link,
    };
  }
}

export default DownloadService;
