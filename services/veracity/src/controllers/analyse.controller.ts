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

import { AnalyseRequestDto } from "../dto/analyse-request.dto.js";
import { toPackageReport } from "../dto/veracity-response.dto.js";
import type { AnalyseResponseDto } from "../dto/veracity-response.dto.js";
import { validated } from "../dto/validation.js";
import { parsePackageUrl } from "../purl.js";
import { VeracityService } from "../services/veracity.service.js";
import type { AnalysisResults } from "../types.js";
import { toHttpException } from "./http-errors.js";

const MAX_LOCKFILE_BYTES = 5 * 1024 * 1024;

function toAnalyseResponse(results: AnalysisResults): AnalyseResponseDto {
  return {
    statistics: results.statistics,
    packages: results.outcomes.map(toPackageReport),
  };
}

@Controller("analyse")
export class AnalyseController {
  constructor(
    @Inject(VeracityService)
    private readonly veracityService: VeracityService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async analyse(@Body(validated(AnalyseRequestDto)) body: AnalyseRequestDto): Promise<AnalyseResponseDto> {
    try {
      const results = await this.veracityService.analyse(body.packages.map(parsePackageUrl));
      return toAnalyseResponse(results);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post("lockfile")
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor("lockfile", {
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_LOCKFILE_BYTES },
  }))
  async analyseLockfile(@UploadedFile() file: Express.Multer.File | undefined): Promise<AnalyseResponseDto> {
    if (!file) {
      throw new BadRequestException("missing lockfile");
    }
    try {
      const results = await this.veracityService.analyseLockfile(file.buffer.toString("utf8"));
      return toAnalyseResponse(results);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
