import { ArrayMaxSize, ArrayMinSize, IsArray, IsString, Matches } from "class-validator";

import { PACKAGE_URL_PATTERN } from "../purl.js";

export const MAX_PACKAGES_PER_REQUEST = 1000;

export class AnalyseRequestDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(MAX_PACKAGES_PER_REQUEST)
  @IsString({ each: true })
  @Matches(PACKAGE_URL_PATTERN, {
    each: true,
    message: "each package must look like pkg:cargo/<name>@<version>",
  })
  packages!: string[];
}
