import { Controller, Get, Inject, NotFoundException, Param, ParseUUIDPipe, Query } from "@nestjs/common";

import { ListReportsQueryDto } from "../dto/list-reports-query.dto.js";
import type { ReportListResponseDto, ReportResponseDto } from "../dto/report-response.dto.js";
import { InspectionService } from "../services/inspection.service.js";
import { validated } from "./validation.js";

const DEFAULT_REPORT_LIMIT = 20;

@Controller()
export class ReportController {
  constructor(
    @Inject(InspectionService)
    private readonly inspectionService: InspectionService,
  ) {}

  @Get("report/:id")
  async getReport(@Param("id", new ParseUUIDPipe()) id: string): Promise<ReportResponseDto> {
    const report = await this.inspectionService.getReport(id);
    if (!report) {
      throw new NotFoundException(`report ${id} not found`);
    }
    return report;
  }

  @Get("reports")
  async listReports(@Query(validated(ListReportsQueryDto)) query: ListReportsQueryDto): Promise<ReportListResponseDto> {
    return { items: await this.inspectionService.listReports(query.limit ?? DEFAULT_REPORT_LIMIT) };
  }
}
