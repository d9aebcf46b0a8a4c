import { MigrationInterface, QueryRunner } from 'typeorm';

export class EvolutionSchema1760800000000 implements MigrationInterface {
  name = 'EvolutionSchema1760800000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // 1. Instancias conocidas (instances sync)
    await queryRunner.query(
      `CREATE TABLE "evolution_instances" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying NOT NULL,
        "connectionName" character varying NOT NULL DEFAULT 'default',
        "status" character varying NOT NULL DEFAULT 'disconnected',
        "phoneNumber" character varying,
        "profileName" character varying,
        "profilePictureUrl" text,
        "lastSeenAt" TIMESTAMP,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_evolution_instances_name" UNIQUE ("name"),
        CONSTRAINT "PK_evolution_instances" PRIMARY KEY ("id")
      )`,
    );

    // 2. Historial de mensajes salientes
    await queryRunner.query(
      `CREATE TABLE "evolution_messages" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "messageId" character varying,
        "instanceName" character varying NOT NULL,
        "remoteJid" character varying,
        "messageType" character varying NOT NULL DEFAULT 'text',
        "status" character varying NOT NULL,
        "payload" jsonb NOT NULL DEFAULT '{}',
        "response" jsonb,
        "errorMessage" text,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_evolution_messages" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_messages_instance" ON "evolution_messages" ("instanceName")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_messages_created" ON "evolution_messages" ("createdAt")`,
    );

    // 3. Mensajes fallidos (retry / prune)
    await queryRunner.query(
      `CREATE TABLE "evolution_failed_messages" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "instanceName" character varying NOT NULL,
        "recipient" character varying,
        "messageType" character varying NOT NULL,
        "payload" jsonb NOT NULL DEFAULT '{}',
        "connectionName" character varying,
        "retryCount" integer NOT NULL DEFAULT 0,
        "lastError" text,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_evolution_failed_messages" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_failed_messages_instance" ON "evolution_failed_messages" ("instanceName")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_failed_messages_created" ON "evolution_failed_messages" ("createdAt")`,
    );

    // 4. Logs de webhooks
    await queryRunner.query(
      `CREATE TABLE "evolution_webhook_logs" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "instanceName" character varying,
        "event" character varying NOT NULL,
        "payload" jsonb NOT NULL DEFAULT '{}',
        "status" character varying NOT NULL,
        "errorMessage" text,
        "processingTimeMs" integer NOT NULL DEFAULT 0,
        "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_evolution_webhook_logs" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_webhook_logs_event" ON "evolution_webhook_logs" ("event")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_evolution_webhook_logs_created" ON "evolution_webhook_logs" ("createdAt")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "evolution_webhook_logs"`);
    await queryRunner.query(`DROP TABLE "evolution_failed_messages"`);
    await queryRunner.query(`DROP TABLE "evolution_messages"`);
    await queryRunner.query(`DROP TABLE "evolution_instances"`);
  }
}
