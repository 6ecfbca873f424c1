import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1700000000000 implements MigrationInterface {
  name = 'InitialSchema1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "activities" (
        "id" uuid NOT NULL,
        "parent_id" uuid,
        "name" character varying(128) NOT NULL,
        CONSTRAINT "PK_activities" PRIMARY KEY ("id"),
        CONSTRAINT "FK_activities_parent" FOREIGN KEY ("parent_id")
          REFERENCES "activities"("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(`CREATE INDEX "IDX_activities_parent_id" ON "activities" ("parent_id")`);

    await queryRunner.query(`
      CREATE TABLE "buildings" (
        "id" uuid NOT NULL,
        "address" text NOT NULL,
        "latitude" double precision NOT NULL,
        "longitude" double precision NOT NULL,
        CONSTRAINT "PK_buildings" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "organizations" (
        "id" uuid NOT NULL,
        "building_id" uuid NOT NULL,
        "name" character varying(255) NOT NULL,
        "phone_numbers" text[] NOT NULL DEFAULT '{}',
        CONSTRAINT "PK_organizations" PRIMARY KEY ("id"),
        CONSTRAINT "FK_organizations_building" FOREIGN KEY ("building_id")
          REFERENCES "buildings"("id") ON DELETE RESTRICT
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_organizations_building_id" ON "organizations" ("building_id")`,
    );

    await queryRunner.query(`
      CREATE TABLE "organization_activities" (
        "organization_id" uuid NOT NULL,
        "activity_id" uuid NOT NULL,
        CONSTRAINT "PK_organization_activities" PRIMARY KEY ("organization_id", "activity_id"),
        CONSTRAINT "FK_organization_activities_organization" FOREIGN KEY ("organization_id")
          REFERENCES "organizations"("id") ON DELETE CASCADE,
        CONSTRAINT "FK_organization_activities_activity" FOREIGN KEY ("activity_id")
          REFERENCES "activities"("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_organization_activities_activity_id" ON "organization_activities" ("activity_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "organization_activities"`);
    await queryRunner.query(`DROP TABLE "organizations"`);
    await queryRunner.query(`DROP TABLE "buildings"`);
    await queryRunner.query(`DROP TABLE "activities"`);
  }
}
