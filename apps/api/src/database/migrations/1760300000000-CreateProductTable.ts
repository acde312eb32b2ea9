import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateProductTable1760300000000 implements MigrationInterface {
    name = 'CreateProductTable1760300000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE IF NOT EXISTS "Product" (
          "id" SERIAL PRIMARY KEY,
          "name" text NOT NULL,
          "description" text NOT NULL,
          "embedding" jsonb,
          "createdAt" TIMESTAMP NOT NULL DEFAULT now(),
          "updatedAt" TIMESTAMP NOT NULL DEFAULT now()
        )`);
        await queryRunner.query(`CREATE INDEX IF NOT EXISTS "IDX_product_name" ON "Product" ("name")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX IF EXISTS "IDX_product_name"`);
        await queryRunner.query(`DROP TABLE IF EXISTS "Product"`);
    }
}
