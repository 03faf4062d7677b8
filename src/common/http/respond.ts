import {
  BadRequestException,
  InternalServerErrorException,
  NotFoundException,
  UnauthorizedException,
} from '@nestjs/common';
import type { ServiceResult } from '../service-result';

/**
 * Unwraps a service result for a controller. Failures become NestJS HTTP
 * exceptions: not_found → 404, conflict and invalid → 400, unauthorized → 401,
 * internal → 500.
 */
export function respond<T>(result: ServiceResult<T>): T {
  switch (result.kind) {
    case 'ok':
      return result.value;
    case 'not_found':
      throw new NotFoundException(result.message);
    case 'conflict':
      throw new BadRequestException(result.message);
    case 'invalid':
      throw new BadRequestException(result.reason);
    case 'unauthorized':
      throw new UnauthorizedException(result.message);
    case 'internal':
      throw new InternalServerErrorException(result.message);
  }
}
