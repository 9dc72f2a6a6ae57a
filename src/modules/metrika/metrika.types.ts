export const METRIKA_CONFIG = Symbol('METRIKA_CONFIG');
export const METRIKA_HTTP = Symbol('METRIKA_HTTP');
export const MEASUREMENT_TRANSPORT = Symbol('MEASUREMENT_TRANSPORT');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');

export type MetrikaConfig = {
  counterId: string | null;
  measurementToken: string | null;
  collectUrl: string;
  requestTimeoutMs: number;
  botUsername: string;
  currency: string;
  brand: string;
};

export type MeasurementHitKind = 'pageview' | 'event' | 'ecommerce_purchase';

export type MeasurementParams = Record<string, string>;

/** Delivers one hit to the collector; resolves false on any failure. */
export interface MeasurementTransport {
  send(kind: MeasurementHitKind, params: MeasurementParams): Promise<boolean>;
}

export type EcommerceProduct = {
  id?: string;
  name?: string;
  brand?: string;
  category?: string;
  price?: number;
  quantity?: number;
  variant?: string;
};

export type PageviewOptions = {
  pageUrl?: string;
  title?: string;
  referrer?: string;
  eventTime?: Date;
};

export type EventOptions = {
  value?: number;
  currency?: string;
  pageUrl?: string;
  eventTime?: Date;
};

export type EcommercePurchaseOptions = {
  currency?: string;
  products?: EcommerceProduct[];
  pageUrl?: string;
  coupon?: string;
  eventTime?: Date;
};

/** What the conversion chain needs from the analytics side. */
export interface EventDispatcher {
  isConfigured(): boolean;
  purchasePageUrl(): string;
  sendPageview(clientId: string, options?: PageviewOptions): Promise<boolean>;
  sendEvent(
    clientId: string,
    eventName: string,
    options?: EventOptions,
  ): Promise<boolean>;
  sendEcommercePurchase(
    clientId: string,
    transactionId: string,
    revenue: number,
    options?: EcommercePurchaseOptions,
  ): Promise<boolean>;
}
