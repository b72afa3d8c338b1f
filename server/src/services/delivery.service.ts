import type {
  DeliveryPlan,
  FailureReason,
  OutboundPayload,
  RetrievedMedia,
} from "../models/download.model";
import { mediaFilename } from "../utils/sanitizer";
import { contentTypeFor, effectiveLinkExpirySeconds } from "./storage.service";

export interface DeliveryRouterOptions {
  inlineThresholdBytes: number;
  retentionWindowSeconds: number;
  cloudAvailable: () => boolean;
}

export interface DeliveryResult {
  inlineDelivered: boolean;
  inlineAttempted: boolean;
  link: string | null;
  uploadAttempted: boolean;
}

export function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatLifetime(seconds: number): string {
  const hours = Math.round(seconds / 3600);
  if (hours >= 1) {
    return hours === 1 ? "1 hour" : `${hours} hours`;
  }
  const minutes = Math.max(1, Math.round(seconds / 60));
  return minutes === 1 ? "1 minute" : `${minutes} minutes`;
}

const FAILURE_MESSAGES: Record<FailureReason, string> = {
  auth_required:
    "❌ Security checkpoint detected. This video requires authentication.\n\n" +
    "Please try:\n• Making sure the video is public\n• Using a direct video link\n• Checking if the video is still available",
  unsupported_source: "❌ This link isn't supported. Please send a YouTube or Facebook video URL.",
  not_found: "❌ Video not found. It might be private or deleted.",
  network_error: "❌ Could not reach the video source. Please try again later.",
  unknown: "❌ Could not download the video. Please try again.",
  upload_failed: "❌ The video is too large to send in chat and the cloud upload failed. Please try again.",
  delivery_failed: "❌ Could not deliver the video. Please try again.",
};

/**
 * Decides how a retrieved file reaches the requester and renders the
 * messages that go with it.
 */
export class DeliveryRouter {
  constructor(private readonly options: DeliveryRouterOptions) {}

  route(media: RetrievedMedia): DeliveryPlan {
    const cloudAvailable = this.options.cloudAvailable();
    const actions: DeliveryPlan["actions"] = [];

    if (media.size <= this.options.inlineThresholdBytes) {
      actions.push("inline");
    }
    if (cloudAvailable) {
      actions.push("upload");
    }

    return { media, actions, cloudAvailable };
  }

  inlinePayload(media: RetrievedMedia): OutboundPayload {
    return {
      kind: "file",
      content: {
        path: media.localPath,
        filename: mediaFilename(media.title, media.localPath),
        mimetype: contentTypeFor(media.localPath),
        caption: media.title,
      },
    };
  }

  /** The single message that closes a successful request. */
  successPayload(plan: DeliveryPlan, result: DeliveryResult): OutboundPayload {
    const { media } = plan;
    const size = formatMegabytes(media.size);
    const header = `✅ ${media.title}`;

    if (result.link) {
      const lifetime = formatLifetime(
        effectiveLinkExpirySeconds(this.options.retentionWindowSeconds),
      );
      let text = `${header}\n\n☁️ Cloud link (${size}):\n${result.link}\n\nLink expires in ${lifetime}.`;
      if (!result.inlineDelivered) {
        text += result.inlineAttempted
          ? "\n\nNote: the video could not be sent directly in chat."
          : "\n\nNote: video was too large to send directly in chat.";
      }
      return { kind: "link", content: { url: result.link, text } };
    }

    const reason = plan.cloudAvailable ? "cloud upload failed" : "no cloud link available";
    return { kind: "text", content: `${header}\n\nVideo sent to chat! (${reason})` };
  }

  failurePayload(reason: FailureReason): OutboundPayload {
    return { kind: "text", content: FAILURE_MESSAGES[reason] };
  }
}
