import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  UploadedFile,
  UseInterceptors,
} from "@nestjs/common";
import { FileInterceptor } from "@nestjs/platform-express";
import multer from "multer";

import { BatchInspectRequestDto } from "../dto/batch-request.dto.js";
import type { BatchResponseDto, DecisionResponseDto } from "../dto/decision-response.dto.js";
import { InspectRequestDto } from "../dto/inspect-request.dto.js";
import { UploadRequestDto } from "../dto/upload-request.dto.js";
import { InspectionService } from "../services/inspection.service.js";
import { validated } from "./validation.js";

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

@Controller("inspect")
export class InspectController {
  constructor(
    @Inject(InspectionService)
    private readonly inspectionService: InspectionService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async inspect(@Body(validated(InspectRequestDto)) body: InspectRequestDto): Promise<DecisionResponseDto> {
    if (body.url !== undefined && body.base64 !== undefined) {
      throw new BadRequestException("provide either url or base64, not both");
    }
    if (body.url !== undefined) {
      return this.inspectionService.inspectUrl(body.url);
    }
    if (body.base64 !== undefined) {
      return this.inspectionService.inspectUpload(body.base64, body.reference);
    }
    throw new BadRequestException("url or base64 is required");
  }

  @Post("upload")
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("image", { storage: multer.memoryStorage(), limits: { fileSize: MAX_UPLOAD_BYTES } }))
  async inspectFile(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body(validated(UploadRequestDto)) body: UploadRequestDto,
  ): Promise<DecisionResponseDto> {
    if (!file) {
      throw new BadRequestException("multipart field \"image\" is required");
    }
    return this.inspectionService.inspectBytes(file.buffer, body.reference ?? `upload:${file.originalname}`);
  }

  @Post("batch")
  @HttpCode(HttpStatus.OK)
  async inspectBatch(@Body(validated(BatchInspectRequestDto)) body: BatchInspectRequestDto): Promise<BatchResponseDto> {
    return this.inspectionService.inspectUrls(body.urls);
  }
}
