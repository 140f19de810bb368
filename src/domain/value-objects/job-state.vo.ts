/**
 * Job State Value Object
 * Shared by the download and callback sub-state machines of a job.
 *
 * Values are persisted verbatim, so they must not be renamed.
 */
export enum JobState {
  PENDING = 'Pending',
  IN_PROGRESS = 'InProgress',
  SUCCESS = 'Success',
  FAILED = 'Failed',
}

/**
 * A download has concluded once the processor recorded its outcome.
 */
export function isConcluded(state: JobState): boolean {
  return state === JobState.SUCCESS || state === JobState.FAILED;
}
