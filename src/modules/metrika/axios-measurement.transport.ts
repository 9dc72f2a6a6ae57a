import { Inject, Injectable, Logger } from '@nestjs/common';
import { AxiosInstance } from 'axios';
import { sendGetRequest } from '../../common/http/get-request';
import {
  MeasurementHitKind,
  MeasurementParams,
  MeasurementTransport,
  METRIKA_CONFIG,
  METRIKA_HTTP,
  MetrikaConfig,
} from './metrika.types';

@Injectable()
export class AxiosMeasurementTransport implements MeasurementTransport {
  private readonly logger = new Logger(AxiosMeasurementTransport.name);

  constructor(
    @Inject(METRIKA_CONFIG) private readonly config: MetrikaConfig,
    @Inject(METRIKA_HTTP) private readonly http: AxiosInstance,
  ) {}

  async send(
    kind: MeasurementHitKind,
    params: MeasurementParams,
  ): Promise<boolean> {
    const result = await sendGetRequest(
      this.http,
      this.config.collectUrl,
      params,
      this.config.requestTimeoutMs,
    );

    if (result.ok) {
      this.logger.log(
        `Sent ${kind} to Metrika for client id ${(params.cid ?? 'unknown').slice(0, 10)}...`,
      );
      return true;
    }

    if (result.status !== null) {
      this.logger.error(
        `Failed to send ${kind} to Metrika. Status: ${result.status}, Response: ${result.body}`,
      );
    } else if (result.timedOut) {
      this.logger.error(`Timeout sending ${kind} to Metrika`);
    } else {
      this.logger.error(`Error sending ${kind} to Metrika: ${result.message}`);
    }
    return false;
  }
}
