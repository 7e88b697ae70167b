import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema migration: creates the generation_jobs table.
 *
 * Hand-written to match the GenerationJob entity, since migration:generate
 * needs a live database connection. PostgreSQL-specific (uuid_generate_v4,
 * timestamptz, jsonb, CREATE TYPE).
 */
export class InitialSchema1760000000000 implements MigrationInterface {
  name = 'InitialSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(
      `CREATE TYPE "generation_jobs_status_enum" AS ENUM ('pending', 'processing', 'completed', 'failed', 'cancelled')`,
    );

    await queryRunner.query(`
      CREATE TABLE "generation_jobs" (
        "id"                uuid NOT NULL DEFAULT uuid_generate_v4(),
        "prompt"            text NOT NULL,
        "model"             varchar(255) NOT NULL DEFAULT 'stable-diffusion',
        "parameters"        jsonb NOT NULL DEFAULT '{}',
        "status"            "generation_jobs_status_enum" NOT NULL DEFAULT 'pending',
        "external_handle"   varchar(255),
        "retry_count"       integer NOT NULL DEFAULT 0,
        "error_message"     text,
        "result_path"       varchar(1024),
        "result_url"        varchar(1024),
        "result_size_bytes" integer,
        "started_at"        TIMESTAMPTZ,
        "completed_at"      TIMESTAMPTZ,
        "created_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"        TIMESTAMPTZ NOT NULL DEFAULT now(),
        "version"           integer NOT NULL,
        CONSTRAINT "PK_generation_jobs" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(
      `CREATE INDEX "IDX_generation_jobs_status" ON "generation_jobs" ("status")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_generation_jobs_status_completed_at" ON "generation_jobs" ("status", "completed_at")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "generation_jobs"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "generation_jobs_status_enum"`);
    await queryRunner.query(`DROP EXTENSION IF EXISTS "uuid-ossp"`);
  }
}
