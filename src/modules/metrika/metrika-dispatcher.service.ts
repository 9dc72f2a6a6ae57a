import { Inject, Injectable, Logger } from '@nestjs/common';
import { normalizeClientId, validateClientId } from './client-id';
import { isMetrikaConfigured } from './metrika.config';
import {
  EcommercePurchaseOptions,
  EcommerceProduct,
  EventDispatcher,
  EventOptions,
  MEASUREMENT_TRANSPORT,
  MeasurementHitKind,
  MeasurementParams,
  MeasurementTransport,
  METRIKA_CONFIG,
  MetrikaConfig,
  PageviewOptions,
} from './metrika.types';

const DEFAULT_PAGE_TITLE = 'Telegram Bot Visit';
const DEFAULT_REFERRER = 'https://yandex.ru';

/**
 * Builds Measurement Protocol hits and hands them to the transport.
 *
 * Every send resolves to a boolean: unconfigured counters and malformed
 * client ids are rejected before any I/O, transport failures are logged by
 * the transport.
 */
@Injectable()
export class MetrikaDispatcherService implements EventDispatcher {
  private readonly logger = new Logger(MetrikaDispatcherService.name);

  constructor(
    @Inject(METRIKA_CONFIG) private readonly config: MetrikaConfig,
    @Inject(MEASUREMENT_TRANSPORT)
    private readonly transport: MeasurementTransport,
  ) {
    if (!this.isConfigured()) {
      this.logger.warn(
        'Metrika is not configured. Set METRIKA_COUNTER_ID and METRIKA_MEASUREMENT_TOKEN',
      );
    }
  }

  isConfigured(): boolean {
    return isMetrikaConfigured(this.config);
  }

  validateClientId(id: string): boolean {
    return validateClientId(id);
  }

  botPageUrl(): string {
    return `https://t.me/${this.config.botUsername}`;
  }

  purchasePageUrl(): string {
    return `${this.botPageUrl()}/purchase`;
  }

  async sendPageview(
    clientId: string,
    options: PageviewOptions = {},
  ): Promise<boolean> {
    const base = this.baseParams('pageview', clientId, options.eventTime);
    if (!base) return false;

    return this.transport.send('pageview', {
      ...base,
      t: 'pageview',
      dr: options.referrer ?? DEFAULT_REFERRER,
      dl: options.pageUrl ?? this.botPageUrl(),
      dt: options.title ?? DEFAULT_PAGE_TITLE,
    });
  }

  async sendEvent(
    clientId: string,
    eventName: string,
    options: EventOptions = {},
  ): Promise<boolean> {
    const base = this.baseParams('event', clientId, options.eventTime);
    if (!base) return false;

    const params: MeasurementParams = {
      ...base,
      t: 'event',
      ea: eventName,
      dl: options.pageUrl ?? this.purchasePageUrl(),
    };
    if (options.value !== undefined && Number.isFinite(options.value)) {
      params.ev = String(Math.trunc(options.value));
      params.cu = options.currency ?? this.config.currency;
    }

    return this.transport.send('event', params);
  }

  async sendEcommercePurchase(
    clientId: string,
    transactionId: string,
    revenue: number,
    options: EcommercePurchaseOptions = {},
  ): Promise<boolean> {
    const base = this.baseParams(
      'ecommerce_purchase',
      clientId,
      options.eventTime,
    );
    if (!base) return false;

    const params: MeasurementParams = {
      ...base,
      t: 'event',
      pa: 'purchase',
      ti: transactionId,
      tr: String(revenue),
      cu: options.currency ?? this.config.currency,
      dl: options.pageUrl ?? this.purchasePageUrl(),
      ...this.productParams(options.products ?? [], revenue),
    };
    if (options.coupon?.trim()) {
      params.tcc = options.coupon.trim();
    }

    return this.transport.send('ecommerce_purchase', params);
  }

  private baseParams(
    kind: MeasurementHitKind,
    clientId: string,
    eventTime?: Date,
  ): MeasurementParams | null {
    const { counterId, measurementToken } = this.config;
    if (!counterId || !measurementToken) {
      this.logger.warn(`Metrika not configured, skipping ${kind}`);
      return null;
    }
    if (!validateClientId(clientId)) {
      this.logger.error(`Invalid client id format: ${clientId}`);
      return null;
    }

    const time = eventTime ?? new Date();
    return {
      tid: counterId,
      cid: normalizeClientId(clientId),
      et: String(Math.floor(time.getTime() / 1000)),
      ms: measurementToken,
    };
  }

  private productParams(
    products: EcommerceProduct[],
    revenue: number,
  ): MeasurementParams {
    const lines: EcommerceProduct[] =
      products.length > 0
        ? products
        : [{ id: 'subscription', name: 'Subscription', price: revenue }];

    const params: MeasurementParams = {};
    lines.forEach((product, index) => {
      const prefix = `pr${index + 1}`;
      params[`${prefix}id`] = product.id ?? `product_${index + 1}`;
      params[`${prefix}nm`] = product.name ?? 'Subscription';
      params[`${prefix}br`] = product.brand ?? this.config.brand;
      params[`${prefix}ca`] = product.category ?? 'Subscription';
      params[`${prefix}pr`] = String(product.price ?? revenue);
      params[`${prefix}qt`] = String(product.quantity ?? 1);
      params[`${prefix}va`] = product.variant ?? 'monthly';
    });
    return params;
  }
}
