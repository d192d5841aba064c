import { Controller, Get, Inject, Query } from "@nestjs/common";

import { CheckQueryDto } from "../dto/check-query.dto.js";
import { toCheckResponse } from "../dto/veracity-response.dto.js";
import type { CheckResponseDto } from "../dto/veracity-response.dto.js";
import { validated } from "../dto/validation.js";
import { parsePackageUrl } from "../purl.js";
import { VeracityService } from "../services/veracity.service.js";
import { toHttpException } from "./http-errors.js";

@Controller("check")
export class CheckController {
  constructor(
    @Inject(VeracityService)
    private readonly veracityService: VeracityService,
  ) {}

  @Get()
  async check(@Query(validated(CheckQueryDto)) query: CheckQueryDto): Promise<CheckResponseDto> {
    try {
      const identity = parsePackageUrl(query.purl);
      const checks = await this.veracityService.check(identity);
      return toCheckResponse(identity, checks);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
