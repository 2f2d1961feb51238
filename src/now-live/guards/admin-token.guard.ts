import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

/**
 * Protects the operator routes when ADMIN_TOKEN is configured; open otherwise.
 */
@Injectable()
export class AdminTokenGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.configService.get<string>('ADMIN_TOKEN');
    if (!expected) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    if (request.header(ADMIN_TOKEN_HEADER) !== expected) {
      throw new UnauthorizedException('Invalid admin token');
    }
    return true;
  }
}
