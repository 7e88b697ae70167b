import { GenerationJob, jobResult } from '@genforge/database';
import { GrpcTimestamp, JobReply } from '@genforge/proto';

export function toGrpcTimestamp(date: Date): GrpcTimestamp {
  const ms = date.getTime();
  return {
    seconds: Math.floor(ms / 1000),
    nanos: (ms % 1000) * 1_000_000,
  };
}

/** Proto3 has no null: absent strings become '' and absent messages are omitted */
export function toJobReply(job: GenerationJob): JobReply {
  const reply: JobReply = {
    jobId: job.id,
    prompt: job.prompt,
    model: job.model,
    status: job.status,
    externalHandle: job.externalHandle ?? '',
    retryCount: job.retryCount,
    errorMessage: job.errorMessage ?? '',
    createdAt: toGrpcTimestamp(job.createdAt),
  };

  const result = jobResult(job);
  if (result) {
    reply.result = result;
  }
  if (job.startedAt) {
    reply.startedAt = toGrpcTimestamp(job.startedAt);
  }
  if (job.completedAt) {
    reply.completedAt = toGrpcTimestamp(job.completedAt);
  }
  return reply;
}
