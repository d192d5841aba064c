import { ValidationPipe } from "@nestjs/common";
import type { Type } from "@nestjs/common";

/**
 * Parameter-level pipe bound to its DTO class, so validation does not rely
 * on emitted `design:paramtypes` metadata.
 */
export function validated<T>(dto: Type<T>): ValidationPipe {
  return new ValidationPipe({
    expectedType: dto,
    whitelist: true,
    transform: true,
  });
}
