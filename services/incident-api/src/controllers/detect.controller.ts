import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  UploadedFile,
  UseFilters,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";

import { DetectRequestDto } from "../dto/detect-request.dto.js";
import { DetectResponseDto } from "../dto/detect-response.dto.js";
import { ApiExceptionFilter } from "../filters/api-exception.filter.js";
import { IncidentService } from "../services/incident.service.js";

@Controller("api")
@UseFilters(ApiExceptionFilter)
export class DetectController {
  constructor(
    @Inject(IncidentService)
    private readonly incidentService: IncidentService,
  ) {}

  @Post("detect_and_report")
  @HttpCode(HttpStatus.CREATED)
  @UseInterceptors(FileInterceptor("image"))
  async detectAndReport(
    @UploadedFile() image: Express.Multer.File | undefined,
    @Body() body: DetectRequestDto,
  ): Promise<DetectResponseDto> {
    if (!image) {
      throw new BadRequestException("No image file provided");
    }
    return this.incidentService.detectAndReport(image, body?.location_id);
  }
}
