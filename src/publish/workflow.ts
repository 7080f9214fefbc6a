import path from "node:path";
import type { Logger } from "../logger.js";
import { AppError, errorMessage } from "../errors.js";
import type { PrivacyStatus } from "../constants.js";
import type {
  ResolvedUploadMetadata,
  UploadMetadata,
  UploadRecord,
  WorkflowState,
} from "../types.js";
import type { UploadRecordStore } from "../store/uploadRecords.js";
import { resolveMediaPath } from "../pipeline/trim.js";
import { extractHashtags } from "./tags.js";
import type { OAuthSession } from "./session.js";
import type { PublishingPlatform } from "./youtube.js";

export interface UploadWorkflowOptions {
  platform: PublishingPlatform;
  store: UploadRecordStore;
  mediaDir: string;
  defaultPrivacy: PrivacyStatus;
  maxTags: number;
  log: Logger;
  onTransition?: (from: WorkflowState, to: WorkflowState, filename: string) => void;
  now?: () => Date;
}

export interface UploadOutcome {
  record: UploadRecord;
  updated: boolean;
  url: string;
}

/**
 * Authorize once, upload once, record once.
 *
 *   Idle → Authorizing → Authorized → Uploading → Recorded
 *             ↘ Aborted                  ↘ Aborted
 *
 * Each call gets a fresh OAuth session that is revoked before returning.
 */
export class UploadWorkflow {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly opts: UploadWorkflowOptions) {
    this.log = opts.log.child({ component: "upload-workflow" });
    this.now = opts.now ?? (() => new Date());
  }

  async publish(filename: string, metadata: UploadMetadata = {}): Promise<UploadOutcome> {
    const assetPath = resolveMediaPath(this.opts.mediaDir, filename);
    const resolved = this.resolveMetadata(filename, metadata);
    const { platform, store } = this.opts;

    let state: WorkflowState = "Idle";
    const moveTo = (next: WorkflowState) => {
      this.log.info({ filename, from: state, to: next }, "Upload workflow transition");
      this.opts.onTransition?.(state, next, filename);
      state = next;
    };

    let session: OAuthSession | undefined;
    try {
      moveTo("Authorizing");
      session = await platform.authorize();
      moveTo("Authorized");

      moveTo("Uploading");
      const remoteId = await platform.upload(session, { filename, path: assetPath }, resolved);

      const { record, updated } = await store.upsert({
        filename,
        platform: platform.name,
        remoteId,
        uploadedAt: this.now().toISOString(),
        ...resolved,
      });
      if (updated) {
        this.log.info({ filename, remoteId }, "Replaced existing upload record");
      }
      moveTo("Recorded");
      return { record, updated, url: platform.watchUrl(remoteId) };
    } catch (err) {
      const failedIn = state;
      moveTo("Aborted");
      this.log.error({ filename, state: failedIn, err: errorMessage(err) }, "Upload workflow aborted");
      throw toWorkflowError(err, failedIn);
    } finally {
      session?.revoke();
    }
  }

  resolveMetadata(filename: string, metadata: UploadMetadata): ResolvedUploadMetadata {
    const caption = metadata.caption?.trim() ?? "";
    return {
      title: metadata.title?.trim() || path.parse(filename).name,
      description: metadata.description?.trim() ?? caption,
      tags: metadata.tags?.length
        ? metadata.tags.slice(0, this.opts.maxTags)
        : extractHashtags(caption, this.opts.maxTags),
      privacy: metadata.privacy ?? this.opts.defaultPrivacy,
    };
  }
}

function toWorkflowError(err: unknown, failedIn: WorkflowState): AppError {
  if (err instanceof AppError && (err.kind === "AuthorizationFailed" || err.kind === "UploadFailed")) {
    return err;
  }
  if (failedIn === "Authorizing") {
    return new AppError("AuthorizationFailed", errorMessage(err), undefined, { cause: err });
  }
  return new AppError("UploadFailed", errorMessage(err), undefined, { cause: err });
}
