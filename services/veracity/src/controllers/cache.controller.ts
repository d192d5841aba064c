import { Controller, Delete, HttpCode, HttpStatus, Inject } from "@nestjs/common";

import { VeracityService } from "../services/veracity.service.js";

@Controller("cache")
export class CacheController {
  constructor(
    @Inject(VeracityService)
    private readonly veracityService: VeracityService,
  ) {}

  @Delete()
  @HttpCode(HttpStatus.NO_CONTENT)
  async clear(): Promise<void> {
    await this.veracityService.clearCache();
  }
}
