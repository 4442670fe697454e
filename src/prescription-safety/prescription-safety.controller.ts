import { Body, Controller, Get, HttpCode, Logger, Post } from '@nestjs/common';
import { PrescriptionSafetyService } from './prescription-safety.service';
import { AnalyzeSafetyReqDto } from './dto/analyze-safety-req.dto';
import { buildPatientContext } from './utils/patient-context';
import { AnalysisResult, AnalysisServiceStatus } from './types/analysis.types';

@Controller('prescription-safety')
export class PrescriptionSafetyController {
  private readonly logger = new Logger(PrescriptionSafetyController.name);

  constructor(
    private readonly prescriptionSafetyService: PrescriptionSafetyService,
  ) {}

  @Post('analyze')
  @HttpCode(200)
  async analyze(@Body() body: AnalyzeSafetyReqDto): Promise<AnalysisResult> {
    this.logger.log(
      `POST /prescription-safety/analyze - ${body.medications.length} medication(s)`,
    );

    const result = await this.prescriptionSafetyService.analyzeSafety(
      body.medications,
      buildPatientContext(body.patient),
    );

    this.logger.log(
      `Analysis finished with source=${result.source} overallRisk=${result.overallRisk}`,
    );
    return result;
  }

  @Get('status')
  getStatus(): AnalysisServiceStatus {
    return this.prescriptionSafetyService.getStatus();
  }
}
