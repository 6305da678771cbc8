import { Controller, Get, Query } from '@nestjs/common';
import { AppointmentService } from './appointment.service';
import type { DoctorSummary } from './ports';

@Controller('doctors')
export class DoctorController {
  constructor(private readonly appointmentService: AppointmentService) {}

  // Selector de médicos al pedir turno: GET /doctors?specialty=pediatría
  @Get()
  async listAvailable(
    @Query('specialty') specialty?: string,
  ): Promise<DoctorSummary[]> {
    const filter = specialty?.trim();

    return this.appointmentService.listAvailableDoctors(
      filter ? filter : undefined,
    );
  }
}
