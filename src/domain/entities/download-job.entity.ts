import { produce } from 'immer';
import * as path from 'path';
import { JobState, isConcluded } from '../value-objects/job-state.vo';

/**
 * Download Job Entity
 *
 * One unit of work: a resource to fetch and a client to notify once the fetch
 * concludes. The record carries two independent state machines:
 *
 * - download: Pending → InProgress → Success | Failed, driven by the processor
 * - callback: Pending → InProgress → (removed) | Pending | Failed, driven by the notifier
 *
 * Records are plain readonly data; every transition returns a new frozen copy.
 */
export interface DownloadJob {
  readonly id: string;
  readonly aggrId: string;
  readonly url: string;
  readonly callbackUrl: string;
  readonly extra: string;
  /** Seconds. Absent means the processor's default applies. */
  readonly downloadTimeout?: number;
  readonly downloadState: JobState;
  readonly downloadMeta: string;
  readonly callbackState: JobState;
  readonly callbackMeta: string;
  readonly callbackCount: number;
}

/**
 * Body POSTed to the client's callback URL.
 */
export interface CallbackPayload {
  success: boolean;
  error: string;
  extra: string;
  download_url: string;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace DownloadJob {
  export interface CreateProps {
    id: string;
    aggrId: string;
    url: string;
    callbackUrl: string;
    extra?: string;
    downloadTimeout?: number;
    downloadState?: JobState;
    downloadMeta?: string;
    callbackState?: JobState;
    callbackMeta?: string;
    callbackCount?: number;
  }

  /**
   * Client-supplied fields of a new job.
   */
  export type Submission = Pick<
    CreateProps,
    'aggrId' | 'url' | 'callbackUrl' | 'extra' | 'downloadTimeout'
  >;

  export function create(props: CreateProps): DownloadJob {
    validate(props);

    return {
      id: props.id,
      aggrId: props.aggrId,
      url: props.url,
      callbackUrl: props.callbackUrl,
      extra: props.extra ?? '',
      downloadTimeout: props.downloadTimeout,
      downloadState: props.downloadState ?? JobState.PENDING,
      downloadMeta: props.downloadMeta ?? '',
      callbackState: props.callbackState ?? JobState.PENDING,
      callbackMeta: props.callbackMeta ?? '',
      callbackCount: props.callbackCount ?? 0,
    };
  }

  export function fromSubmission(id: string, submission: Submission): DownloadJob {
    return create({ id, ...submission });
  }

  function validate(props: CreateProps): void {
    if (!props.id || props.id.trim().length === 0) {
      throw new Error('Job ID is required');
    }
    if (!props.aggrId) {
      throw new Error('Aggregation ID is required');
    }
    if (
      props.callbackCount !== undefined &&
      (!Number.isInteger(props.callbackCount) || props.callbackCount < 0)
    ) {
      throw new Error('Callback count must be a non-negative integer');
    }
  }

  // ===== Queries =====

  export function isEligibleForCallback(job: DownloadJob): boolean {
    return isConcluded(job.downloadState);
  }

  /**
   * Retrieval link handed to the client: the base URL's path joined with the job
   * ID. Empty unless the download succeeded.
   */
  export function buildDownloadUrl(job: DownloadJob, baseUrl: URL): string {
    if (job.downloadState !== JobState.SUCCESS) {
      return '';
    }

    const downloadUrl = new URL(baseUrl.toString());
    downloadUrl.pathname = path.posix.join(
      downloadUrl.pathname,
      encodeURIComponent(job.id),
    );
    return downloadUrl.toString();
  }

  export function toCallbackPayload(job: DownloadJob, baseUrl: URL): CallbackPayload {
    return {
      success: job.downloadState === JobState.SUCCESS,
      error: job.downloadMeta,
      extra: job.extra,
      download_url: buildDownloadUrl(job, baseUrl),
    };
  }

  // ===== Download transitions (processor side) =====

  export function withDownloadSuccess(job: DownloadJob): DownloadJob {
    return produce(job, (draft) => {
      draft.downloadState = JobState.SUCCESS;
      draft.downloadMeta = '';
    });
  }

  export function withDownloadFailure(job: DownloadJob, meta: string): DownloadJob {
    return produce(job, (draft) => {
      draft.downloadState = JobState.FAILED;
      draft.downloadMeta = meta;
    });
  }

  // ===== Callback transitions (notifier side) =====

  export function incrementCallbackCount(job: DownloadJob): DownloadJob {
    return produce(job, (draft) => {
      draft.callbackCount += 1;
    });
  }

  export function markCallbackInProgress(job: DownloadJob): DownloadJob {
    return produce(job, (draft) => {
      draft.callbackState = JobState.IN_PROGRESS;
      draft.callbackMeta = '';
    });
  }

  export function markCallbackPending(job: DownloadJob, meta: string): DownloadJob {
    return produce(job, (draft) => {
      draft.callbackState = JobState.PENDING;
      draft.callbackMeta = meta;
    });
  }

  export function markCallbackFailed(job: DownloadJob, meta: string): DownloadJob {
    return produce(job, (draft) => {
      draft.callbackState = JobState.FAILED;
      draft.callbackMeta = meta;
    });
  }
}
