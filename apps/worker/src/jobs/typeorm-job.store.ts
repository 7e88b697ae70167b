import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, IsNull, LessThan, Not, Repository } from 'typeorm';
import { GenerationJob, GenerationJobStatus } from '@genforge/database';
import {
  GenerationJobPatch,
  JobListFilter,
  JobStore,
  NewGenerationJob,
} from './job-store';
import { StaleJobUpdateException } from './exceptions/job.exceptions';

/**
 * TypeOrmJobStore: JobStore over the `generation_jobs` table.
 *
 * Conditional writes are a single `UPDATE … WHERE id = :id AND version = :version`;
 * TypeORM's update builder bumps the version column and `updated_at` itself.
 */
@Injectable()
export class TypeOrmJobStore implements JobStore {
  private readonly logger = new Logger(TypeOrmJobStore.name);

  constructor(
    @InjectRepository(GenerationJob)
    private readonly repository: Repository<GenerationJob>,
  ) {}

  async create(input: NewGenerationJob): Promise<GenerationJob> {
    const job = this.repository.create({
      prompt: input.prompt,
      model: input.model,
      parameters: input.parameters,
      status: GenerationJobStatus.PENDING,
      retryCount: 0,
    });
    return this.repository.save(job);
  }

  findById(id: string): Promise<GenerationJob | null> {
    return this.repository.findOne({ where: { id } });
  }

  async update(
    job: GenerationJob,
    patch: GenerationJobPatch,
  ): Promise<GenerationJob> {
    const result = await this.repository
      .createQueryBuilder()
      .update(GenerationJob)
      .set(patch)
      .where('id = :id AND version = :version', {
        id: job.id,
        version: job.version,
      })
      .execute();

    if (result.affected !== 1) {
      this.logger.debug(
        `Conditional update of job ${job.id} at version ${job.version} rejected`,
      );
      throw new StaleJobUpdateException(job.id, job.version);
    }

    return Object.assign(new GenerationJob(), job, patch, {
      version: job.version + 1,
      updatedAt: new Date(),
    });
  }

  list(filter: JobListFilter): Promise<GenerationJob[]> {
    return this.repository.find({
      where: filter.status ? { status: filter.status } : {},
      order: { createdAt: 'DESC' },
      take: filter.limit,
      skip: filter.offset,
    });
  }

  findSweepable(cutoff: Date, limit: number): Promise<GenerationJob[]> {
    return this.repository.find({
      where: {
        status: GenerationJobStatus.COMPLETED,
        completedAt: LessThan(cutoff),
        resultPath: Not(IsNull()),
      },
      order: { completedAt: 'ASC' },
      take: limit,
    });
  }

  async findUnfinishedIds(): Promise<string[]> {
    const jobs = await this.repository.find({
      select: { id: true },
      where: {
        status: In([
          GenerationJobStatus.PENDING,
          GenerationJobStatus.PROCESSING,
        ]),
      },
    });
    return jobs.map((job) => job.id);
  }
}
