import {
  BadGatewayException,
  BadRequestException,
  GatewayTimeoutException,
  HttpException,
} from "@nestjs/common";

import { HttpRequestError } from "../clients/http.client.js";
import { InvalidLockfileError } from "../lockfile.js";
import { InvalidPackageError } from "../purl.js";
import { AggregationTimeoutError } from "../services/evaluation.coordinator.js";

/** Maps evaluation failures onto HTTP answers; anything else stays a 500. */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof InvalidPackageError || error instanceof InvalidLockfileError) {
    return new BadRequestException(error.message);
  }
  if (error instanceof AggregationTimeoutError) {
    return new GatewayTimeoutException(error.message);
  }
  if (error instanceof HttpRequestError) {
    return new BadGatewayException(error.message);
  }
  return error;
}
