import { IsIn, IsOptional } from "class-validator";

import type { InquireCoverage } from "../types.js";

export const INQUIRE_COVERAGES: readonly InquireCoverage[] = ["small", "medium", "large", "huge"];

export class InquireQueryDto {
  @IsOptional()
  @IsIn(INQUIRE_COVERAGES, {
    message: "coverage must be one of small, medium, large, huge",
  })
  coverage?: InquireCoverage;
}
