import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateChatLogTable1760301000000 implements MigrationInterface {
    name = 'CreateChatLogTable1760301000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE IF NOT EXISTS "ChatLog" (
          "id" SERIAL PRIMARY KEY,
          "timestamp" TIMESTAMP NOT NULL DEFAULT now(),
          "query" text NOT NULL,
          "response" text NOT NULL
        )`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_chatlog_timestamp" ON "ChatLog" ("timestamp")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_chatlog_timestamp"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "ChatLog"`);
    }
}
