import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateRecommendations1730000000000 implements MigrationInterface {
    name = 'CreateRecommendations1730000000000';

    public async up(queryRunner: QueryRunner): Promise<void> {
      await queryRunner.query('CREATE TYPE "rec_type" AS ENUM (\'cross-sell\', \'up-sell\', \'accessory\')');
      await queryRunner.query('CREATE TYPE "rec_status" AS ENUM (\'active\', \'inactive\')');

      await queryRunner.query(`
            CREATE TABLE "recommendations" (
                "recommendation_id" SERIAL NOT NULL,
                "base_product_id" integer NOT NULL,
                "recommended_product_id" integer NOT NULL,
                "recommendation_type" "rec_type" NOT NULL,
                "status" "rec_status" NOT NULL DEFAULT 'active',
                "confidence_score" numeric(3,2) NOT NULL,
                "base_product_price" numeric(14,2),
                "recommended_product_price" numeric(14,2),
                "base_product_description" character varying(1023),
                "recommended_product_description" character varying(1023),
                "created_date" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_date" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "pk_recommendations" PRIMARY KEY ("recommendation_id"),
                CONSTRAINT "chk_recommendations_confidence" CHECK ("confidence_score" >= 0 AND "confidence_score" <= 1),
                CONSTRAINT "chk_recommendations_base_price" CHECK ("base_product_price" >= 0),
                CONSTRAINT "chk_recommendations_recommended_price" CHECK ("recommended_product_price" >= 0)
            )
        `);

      // flat discounts scan by type, listings filter by base product
      await queryRunner.query('CREATE INDEX "idx_recommendations_type" ON "recommendations" ("recommendation_type")');
      await queryRunner.query('CREATE INDEX "idx_recommendations_base_product_id" ON "recommendations" ("base_product_id")');
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
      await queryRunner.query('DROP INDEX IF EXISTS "idx_recommendations_base_product_id"');
      await queryRunner.query('DROP INDEX IF EXISTS "idx_recommendations_type"');
      await queryRunner.query('DROP TABLE IF EXISTS "recommendations"');
      await queryRunner.query('DROP TYPE IF EXISTS "rec_status"');
      await queryRunner.query('DROP TYPE IF EXISTS "rec_type"');
    }
}
