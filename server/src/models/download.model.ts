export type RetrievalErrorKind =
  | "unsupported_source"
  | "auth_required"
  | "not_found"
  | "network_error"
  | "unknown";

export type FailureReason = RetrievalErrorKind | "upload_failed" | "delivery_failed";

export type DownloadStatus = "success" | `failed:${FailureReason}`;

export interface DownloadRequest {
  sender: string;
  url: string;
  requestedAt: Date;
}

export interface RetrievedMedia {
  localPath: string;
  size: number;
  title: string;
  duration: number | null;
  sourceUrl: string;
}

export interface UploadedArtifact {
  remoteRef: string;
  url: string;
  localPath: string;
  uploadedAt: Date;
}

export interface DownloadRecord {
  sender: string;
  url: string;
  title: string | null;
  size: number | null;
  duration: number | null;
  status: DownloadStatus;
  createdAt: Date;
}

export interface DownloadStats {
  total: number;
  success: number;
  failed: number;
  byDay: Record<string, number>;
  totalUsers: number;
  totalSizeBytes: number;
}

export type DeliveryAction = "inline" | "upload";

export interface DeliveryPlan {
  media: RetrievedMedia;
  actions: DeliveryAction[];
  cloudAvailable: boolean;
}

export interface DeliveryOutcome {
  status: DownloadStatus;
  title: string | null;
  size: number | null;
  inlineDelivered: boolean;
  link: string | null;
}

export type OutboundPayload =
  | { kind: "text"; content: string }
  | {
      kind: "file";
      content: {
        path: string;
        filename: string;
        mimetype: string;
        caption?: string;
      };
    }
  | { kind: "link"; content: { url: string; text: string } };

/**
 * Lifecycle of one request inside the orchestrator. Every path ends in
 * `recorded -> terminal`.
 */
export type RequestState =
  | "received"
  | "retrieving"
  | "retrieved"
  | "retrieval_failed"
  | "routing"
  | "delivered"
  | "delivery_failed"
  | "recorded"
  | "terminal";

export type RetentionState = "live" | "deleting" | "gone";

export interface RetentionTarget {
  localPath?: string;
  remoteRef?: string;
}

export interface RetentionEntry extends RetentionTarget {
  id: string;
  registeredAt: Date;
  deadline: Date;
  state: RetentionState;
  localDeleted: boolean;
  remoteDeleted: boolean;
}

export interface StoredObject {
  remoteRef: string;
  lastModified: Date;
}

// Incoming WAHA webhook body
export interface WahaMessageEvent {
  event: "message";
  session?: string;
  payload: {
    id?: string;
    from: string;
    body?: string;
    fromMe?: boolean;
  };
}
