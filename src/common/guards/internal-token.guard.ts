import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHash, timingSafeEqual } from 'node:crypto';

export const INTERNAL_TOKEN_HEADER = 'x-internal-token';

@Injectable()
export class InternalTokenGuard implements CanActivate {
  constructor(private readonly configService: ConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<{
      headers?: Record<string, string | string[] | undefined>;
    }>();
    const expected = this.configService.get<string>('INTERNAL_API_TOKEN') ?? '';
    const header = req.headers?.[INTERNAL_TOKEN_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;

    if (!expected || !provided || !this.tokensMatch(provided, expected)) {
      throw new UnauthorizedException('Invalid internal token');
    }
    return true;
  }

  private tokensMatch(provided: string, expected: string): boolean {
    const digest = (value: string) => createHash('sha256').update(value).digest();
    return timingSafeEqual(digest(provided), digest(expected));
  }
}
