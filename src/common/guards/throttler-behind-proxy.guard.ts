import { Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

type ProxiedRequest = {
  headers?: Record<string, string | string[] | undefined>;
  ips?: string[];
  ip?: string;
};

// Clicks arrive through the ad network's redirector and our reverse proxy.
@Injectable()
export class ThrottlerBehindProxyGuard extends ThrottlerGuard {
  protected getTracker(req: ProxiedRequest): Promise<string> {
    const forwarded = this.firstHeaderValue(req, 'x-forwarded-for');
    const clientIp = forwarded?.split(',')[0]?.trim();
    if (clientIp) {
      return Promise.resolve(clientIp);
    }

    const realIp = this.firstHeaderValue(req, 'x-real-ip')?.trim();
    if (realIp) {
      return Promise.resolve(realIp);
    }

    return Promise.resolve(req.ips?.[0] ?? req.ip ?? 'unknown');
  }

  private firstHeaderValue(req: ProxiedRequest, name: string) {
    const value = req.headers?.[name];
    return Array.isArray(value) ? value[0] : value;
  }
}
