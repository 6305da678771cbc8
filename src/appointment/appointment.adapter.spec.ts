import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { AppointmentAdapter } from './appointment.adapter';
import { Appointment } from './entities/appointment.entity';
import { AppointmentStatus } from './enums/appointment-status.enum';
import { UserRole } from '../user/enums/user-role.enum';
import {
  NotFoundError,
  VersionConflictError,
} from './errors/appointment.errors';

const DATE_TIME = new Date('2026-11-02T14:30:00Z');
const CREATED_AT = new Date('2026-10-01T09:00:00Z');
const APPOINTMENT_ID = 'a1b2c3d4-0000-4000-8000-000000000001';

function buildEntity(overrides: Partial<Appointment> = {}): Appointment {
  return Object.assign(new Appointment(), {
    id: APPOINTMENT_ID,
    patientId: 'p-1',
    doctorId: 'd-1',
    nurseId: null,
    patientName: 'Ana Paciente',
    doctorName: 'Dr. Bruno',
    dateTime: DATE_TIME,
    reason: 'Control',
    notes: null,
    status: 'pending',
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    version: 1,
    ...overrides,
  });
}

describe('AppointmentAdapter', () => {
  let adapter: AppointmentAdapter;

  const queryBuilder = {
    update: jest.fn().mockReturnThis(),
    set: jest.fn().mockReturnThis(),
    where: jest.fn().mockReturnThis(),
    andWhere: jest.fn().mockReturnThis(),
    execute: jest.fn(),
  };

  const repository = {
    create: jest.fn(),
    save: jest.fn(),
    findOneBy: jest.fn(),
    find: jest.fn(),
    existsBy: jest.fn(),
    delete: jest.fn(),
    createQueryBuilder: jest.fn(() => queryBuilder),
  };

  beforeEach(async () => {
    jest.clearAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        AppointmentAdapter,
        { provide: getRepositoryToken(Appointment), useValue: repository },
      ],
    }).compile();

    adapter = moduleRef.get(AppointmentAdapter);
  });

  it('create devuelve el id generado', async () => {
    const entity = buildEntity();
    repository.create.mockReturnValue(entity);
    repository.save.mockResolvedValue(entity);

    const id = await adapter.create({
      patientId: 'p-1',
      doctorId: 'd-1',
      nurseId: null,
      patientName: 'Ana Paciente',
      doctorName: 'Dr. Bruno',
      dateTime: DATE_TIME,
      reason: 'Control',
      notes: null,
      status: AppointmentStatus.PENDING,
    });

    expect(id).toBe(entity.id);
    expect(repository.create).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'pending', dateTime: DATE_TIME }),
    );
  });

  it('get devuelve null si no existe', async () => {
    repository.findOneBy.mockResolvedValue(null);

    await expect(adapter.get('nada')).resolves.toBeNull();
  });

  it('get lee un estado desconocido como pending', async () => {
    repository.findOneBy.mockResolvedValue(buildEntity({ status: 'archived' }));

    const record = await adapter.get(APPOINTMENT_ID);

    expect(record?.status).toBe(AppointmentStatus.PENDING);
  });

  it('listByParticipant filtra por la columna del rol', async () => {
    repository.find.mockResolvedValue([buildEntity({ nurseId: 'n-1' })]);

    const records = await adapter.listByParticipant(
      'n-1',
      UserRole.NURSE,
      AppointmentStatus.CONFIRMED,
    );

    expect(repository.find).toHaveBeenCalledWith({
      where: { nurseId: 'n-1', status: AppointmentStatus.CONFIRMED },
      order: { dateTime: 'ASC' },
    });
    expect(records).toHaveLength(1);
    expect(records[0]?.nurseId).toBe('n-1');
  });

  describe('updateFields', () => {
    const updatedAt = new Date('2026-10-18T12:00:00Z');

    it('escribe con compare-and-swap sobre version', async () => {
      queryBuilder.execute.mockResolvedValue({ affected: 1 });
      repository.findOneBy.mockResolvedValue(
        buildEntity({ status: 'confirmed', version: 4, updatedAt }),
      );

      const record = await adapter.updateFields(
        APPOINTMENT_ID,
        { status: AppointmentStatus.CONFIRMED, updatedAt },
        3,
      );

      expect(queryBuilder.update).toHaveBeenCalledWith(Appointment);
      expect(queryBuilder.set).toHaveBeenCalledWith({
        updatedAt,
        version: expect.any(Function),
        status: AppointmentStatus.CONFIRMED,
      });
      expect(queryBuilder.where).toHaveBeenCalledWith('id = :appointmentId', {
        appointmentId: APPOINTMENT_ID,
      });
      expect(queryBuilder.andWhere).toHaveBeenCalledWith(
        'version = :expectedVersion',
        { expectedVersion: 3 },
      );
      expect(record).toMatchObject({
        status: AppointmentStatus.CONFIRMED,
        version: 4,
      });
    });

    it('reporta conflicto si el turno existe con otra versión', async () => {
      queryBuilder.execute.mockResolvedValue({ affected: 0 });
      repository.existsBy.mockResolvedValue(true);

      await expect(
        adapter.updateFields(APPOINTMENT_ID, { updatedAt }, 1),
      ).rejects.toBeInstanceOf(VersionConflictError);
    });

    it('reporta NotFound si el turno ya no existe', async () => {
      queryBuilder.execute.mockResolvedValue({ affected: 0 });
      repository.existsBy.mockResolvedValue(false);

      await expect(
        adapter.updateFields(APPOINTMENT_ID, { updatedAt }, 1),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('delete informa si borró algo', async () => {
    repository.delete.mockResolvedValueOnce({ affected: 1 });
    repository.delete.mockResolvedValueOnce({ affected: 0 });

    await expect(adapter.delete(APPOINTMENT_ID)).resolves.toBe(true);
    await expect(adapter.delete(APPOINTMENT_ID)).resolves.toBe(false);
  });

  describe('con un id que no es uuid', () => {
    it('get devuelve null sin consultar la base', async () => {
      await expect(adapter.get('abc')).resolves.toBeNull();
      expect(repository.findOneBy).not.toHaveBeenCalled();
    });

    it('updateFields reporta NotFound sin escribir', async () => {
      await expect(
        adapter.updateFields('abc', { updatedAt: CREATED_AT }, 1),
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(repository.createQueryBuilder).not.toHaveBeenCalled();
    });

    it('delete devuelve false sin borrar', async () => {
      await expect(adapter.delete('abc')).resolves.toBe(false);
      expect(repository.delete).not.toHaveBeenCalled();
    });
  });
});
