// ── Entities ────────────────────────────────────────────────
export {
  GenerationJob,
  jobResult,
} from './entities/generation-job.entity';
export type {
  GenerationParameters,
  GenerationJobResult,
} from './entities/generation-job.entity';

// ── Enums ───────────────────────────────────────────────────
export { GenerationJobStatus } from './enums/generation-job-status.enum';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
