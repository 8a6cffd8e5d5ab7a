import { MigrationInterface, QueryRunner } from 'typeorm';

export class TempMailboxBaseline20261019000000 implements MigrationInterface {
  name = 'TempMailboxBaseline20261019000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "mailboxes" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "address" character varying NOT NULL,
        "localPart" character varying NOT NULL,
        "domain" character varying NOT NULL,
        "status" character varying NOT NULL DEFAULT 'ACTIVE',
        "createdAt" TIMESTAMP NOT NULL,
        "expiresAt" TIMESTAMP NOT NULL,
        "expiredAt" TIMESTAMP,
        "deletedAt" TIMESTAMP,
        "lastScannedAt" TIMESTAMP,
        "scanWatermarkAt" TIMESTAMP,
        "updatedAt" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_mailboxes_address" UNIQUE ("address"),
        CONSTRAINT "CHK_mailboxes_expiry_after_creation"
          CHECK ("expiresAt" > "createdAt")
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_mailboxes_domain"
      ON "mailboxes" ("domain")
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_mailboxes_status"
      ON "mailboxes" ("status")
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_mailboxes_expiresAt"
      ON "mailboxes" ("expiresAt")
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_mailboxes_deletedAt"
      ON "mailboxes" ("deletedAt")
    `);
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "verification_records" (
        "id" uuid PRIMARY KEY DEFAULT uuid_generate_v4(),
        "mailboxAddress" character varying NOT NULL,
        "code" character varying NOT NULL,
        "patternName" character varying NOT NULL,
        "sourceMessageId" character varying NOT NULL,
        "sender" text,
        "subject" text,
        "content" text,
        "receivedAt" TIMESTAMP NOT NULL,
        "extractedAt" TIMESTAMP NOT NULL,
        "isRead" boolean NOT NULL DEFAULT false,
        CONSTRAINT "UQ_verification_records_mailbox_message"
          UNIQUE ("mailboxAddress", "sourceMessageId"),
        CONSTRAINT "FK_verification_records_mailbox"
          FOREIGN KEY ("mailboxAddress") REFERENCES "mailboxes" ("address")
          ON DELETE CASCADE
      )
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "IDX_verification_records_mailbox_receivedAt"
      ON "verification_records" ("mailboxAddress", "receivedAt")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      DROP INDEX IF EXISTS "IDX_verification_records_mailbox_receivedAt"
    `);
    await queryRunner.query(`DROP TABLE IF EXISTS "verification_records"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_mailboxes_deletedAt"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_mailboxes_expiresAt"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_mailboxes_status"`);
    await queryRunner.query(`DROP INDEX IF EXISTS "IDX_mailboxes_domain"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "mailboxes"`);
  }
}
