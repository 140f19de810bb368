import { DownloadJob } from '../../../domain/entities/download-job.entity';

/**
 * Submit Job Command
 * Raw wire payload as received from a client
 */
export interface SubmitJobCommand {
  payload: string | Buffer;
}

export interface SubmitJobResult {
  job: DownloadJob;
}

/**
 * Submit Job Port (Driving Port / Use Case Interface)
 * Validates a submission, stores the job and queues it for download
 */
export interface SubmitJobPort {
  execute(command: SubmitJobCommand): Promise<SubmitJobResult>;
}
