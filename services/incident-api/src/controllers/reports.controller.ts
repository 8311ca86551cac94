import { Controller, Get, Inject, UseFilters } from "@nestjs/common";

import { ReportsResponseDto } from "../dto/reports-response.dto.js";
import { ApiExceptionFilter } from "../filters/api-exception.filter.js";
import { AnalyticsService } from "../services/analytics.service.js";

@Controller("api")
@UseFilters(ApiExceptionFilter)
export class ReportsController {
  constructor(
    @Inject(AnalyticsService)
    private readonly analyticsService: AnalyticsService,
  ) {}

  @Get("get_reports")
  async getReports(): Promise<ReportsResponseDto> {
    return this.analyticsService.getReport();
  }
}
