import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import {
  GetRequestParams,
  sendGetRequest,
} from '../../common/http/get-request';

export const POSTBACK_HTTP = Symbol('POSTBACK_HTTP');

const POSTBACK_TIMEOUT_MS = 10_000;
const SUB_ID_PATTERN = /^[A-Za-z0-9_]{1,64}$/;

export function isValidSubId(subId: string | null | undefined): boolean {
  return SUB_ID_PATTERN.test(String(subId ?? '').trim());
}

/** Install and sale notifications for the traffic partner's tracker. */
@Injectable()
export class PostbackService {
  private readonly logger = new Logger(PostbackService.name);
  private readonly postbackUrl: string | null;

  constructor(
    configService: ConfigService,
    @Inject(POSTBACK_HTTP) private readonly http: AxiosInstance,
  ) {
    this.postbackUrl = configService.get<string>('POSTBACK_URL')?.trim() || null;
  }

  isConfigured(): boolean {
    return this.postbackUrl !== null;
  }

  async sendInstall(subId: string): Promise<boolean> {
    return this.send('install', subId, { status: 'lead' });
  }

  async sendPurchase(subId: string, payout: number): Promise<boolean> {
    return this.send('purchase', subId, {
      status: 'sale',
      payout: String(payout),
    });
  }

  private async send(
    eventType: 'install' | 'purchase',
    subId: string,
    extra: GetRequestParams,
  ): Promise<boolean> {
    if (!this.postbackUrl) {
      return false;
    }
    const normalizedSubId = String(subId ?? '').trim();
    if (!isValidSubId(normalizedSubId)) {
      this.logger.warn(`Cannot send ${eventType} postback: subid is empty or malformed`);
      return false;
    }

    const result = await sendGetRequest(
      this.http,
      this.postbackUrl,
      { subid: normalizedSubId, ...extra },
      POSTBACK_TIMEOUT_MS,
    );

    if (result.ok) {
      this.logger.log(`Sent ${eventType} postback for subid ${normalizedSubId}`);
      return true;
    }
    if (result.status !== null) {
      this.logger.error(
        `Failed to send ${eventType} postback. Status: ${result.status}, Response: ${result.body}`,
      );
    } else {
      this.logger.error(
        result.timedOut
          ? `Timeout sending ${eventType} postback`
          : `Error sending ${eventType} postback: ${result.message}`,
      );
    }
    return false;
  }
}
