import { IsString, Matches } from "class-validator";

import { PACKAGE_URL_PATTERN } from "../purl.js";

export class CheckQueryDto {
  @IsString()
  @Matches(PACKAGE_URL_PATTERN, {
    message: "purl must look like pkg:cargo/<name>@<version>",
  })
  purl!: string;
}
