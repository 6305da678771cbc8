import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateUsersAndAppointments1790000000000
  implements MigrationInterface
{
  name = 'CreateUsersAndAppointments1790000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    // 1. Tabla USERS (pacientes, médicos, enfermería)
    await queryRunner.query(
      `CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "name" character varying(100) NOT NULL,
        "role" character varying(20) NOT NULL DEFAULT 'patient',
        "specialty" character varying(100),
        "isActive" boolean NOT NULL DEFAULT true,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_users_role_specialty" ON "users" ("role", "specialty")`,
    );

    // 2. Tabla APPOINTMENTS
    await queryRunner.query(
      `CREATE TABLE "appointments" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "patientId" uuid NOT NULL,
        "doctorId" uuid NOT NULL,
        "nurseId" uuid,
        "patientName" character varying(100) NOT NULL,
        "doctorName" character varying(100) NOT NULL,
        "dateTime" TIMESTAMP WITH TIME ZONE NOT NULL,
        "reason" text NOT NULL,
        "notes" text,
        "status" character varying(20) NOT NULL DEFAULT 'pending',
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "version" integer NOT NULL DEFAULT 1,
        CONSTRAINT "CHK_appointments_distinct_participants" CHECK ("patientId" <> "doctorId"),
        CONSTRAINT "PK_appointments" PRIMARY KEY ("id")
      )`,
    );

    // 3. Índices por participante (listados ordenados por fecha)
    await queryRunner.query(
      `CREATE INDEX "IDX_appointments_patient_date" ON "appointments" ("patientId", "dateTime")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_appointments_doctor_date" ON "appointments" ("doctorId", "dateTime")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_appointments_nurse_date" ON "appointments" ("nurseId", "dateTime")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "public"."IDX_appointments_nurse_date"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_appointments_doctor_date"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_appointments_patient_date"`);
    await queryRunner.query(`DROP TABLE "appointments"`);
    await queryRunner.query(`DROP INDEX "public"."IDX_users_role_specialty"`);
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
