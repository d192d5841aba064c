import { Controller, Get, Inject, Query } from "@nestjs/common";

import { InquireQueryDto } from "../dto/inquire-query.dto.js";
import { toPackageReport } from "../dto/veracity-response.dto.js";
import type { InquireResponseDto } from "../dto/veracity-response.dto.js";
import { validated } from "../dto/validation.js";
import { EcosystemInquirer } from "../services/ecosystem.inquirer.js";
import { toHttpException } from "./http-errors.js";

@Controller("inquire")
export class InquireController {
  constructor(
    @Inject(EcosystemInquirer)
    private readonly inquirer: EcosystemInquirer,
  ) {}

  @Get()
  async inquire(@Query(validated(InquireQueryDto)) query: InquireQueryDto): Promise<InquireResponseDto> {
    try {
      const { outcomes, ...summary } = await this.inquirer.inquire(query.coverage ?? "small");
      return { ...summary, packages: outcomes.map(toPackageReport) };
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
