import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { randomInt } from 'node:crypto';
import { Repository } from 'typeorm';
import { readBoundedNumber } from '../../common/config-number';
import { SLEEP, Sleep } from '../../common/sleep';
import { BotSubscriber } from '../bot/entities/bot-subscriber.entity';
import { EVENT_DISPATCHER, EventDispatcher } from '../metrika/metrika.types';
import { Payment, PaymentStatus } from '../payments/entities/payment.entity';
import { PaymentsService } from '../payments/payments.service';
import { PostbackService } from '../postback/postback.service';
import { AttributionStoreService } from './attribution-store.service';
import { isVisitOpen, VisitWindow } from './session-reconciler';

export const PURCHASE_GOAL_NAME = 'purchase_completed';
export const MIN_EVENT_SPACING_MS = 500;

export type ConversionChainState =
  | 'START'
  | 'CHECK_DUPLICATE'
  | 'CHECK_SESSION'
  | 'OPEN_SESSION'
  | 'SEND_PURCHASE'
  | 'SEND_GOAL'
  | 'PERSIST'
  | 'DONE'
  | 'FAILED';

export type ConversionChainFailure =
  | 'not_configured'
  | 'no_tracking'
  | 'pageview_failed'
  | 'purchase_failed';

export type ConversionChainOutcome = {
  success: boolean;
  trail: ConversionChainState[];
  failure: ConversionChainFailure | null;
  duplicate: boolean;
};

export type ConversionChainInput = {
  userId: string;
  amount: number;
  paymentId: string;
  subscriptionMonths: number;
  promoCode?: string | null;
  currency?: string;
};

export type ResendTally = {
  processed: number;
  success: number;
  failed: number;
};

export type PurchaseSignal = ConversionChainInput;

export type PurchaseSignalResult = {
  paymentId: string;
  conversionSent: boolean;
  postbackSent: boolean;
};

export type SelfTestResult = {
  configured: boolean;
  clientId: string;
  pageview: boolean;
  ecommerce: boolean;
  goal: boolean;
};

@Injectable()
export class ConversionChainService {
  private readonly logger = new Logger(ConversionChainService.name);
  private readonly visitWindow: VisitWindow;
  private readonly eventSpacingMs: number;
  private readonly resendThrottleMs: number;

  constructor(
    private readonly store: AttributionStoreService,
    private readonly paymentsService: PaymentsService,
    private readonly postbackService: PostbackService,
    @Inject(EVENT_DISPATCHER) private readonly dispatcher: EventDispatcher,
    @Inject(SLEEP) private readonly sleep: Sleep,
    @InjectRepository(BotSubscriber)
    private readonly subscriberRepo: Repository<BotSubscriber>,
    configService: ConfigService,
  ) {
    this.visitWindow = {
      visitCompletionHours: readBoundedNumber(
        configService,
        'VISIT_COMPLETION_HOURS',
        12,
        0,
        72,
      ),
      sessionTimeoutMinutes: readBoundedNumber(
        configService,
        'SESSION_TIMEOUT_MINUTES',
        30,
        0,
        240,
      ),
    };
    this.eventSpacingMs = readBoundedNumber(
      configService,
      'CONVERSION_EVENT_SPACING_MS',
      1_000,
      MIN_EVENT_SPACING_MS,
      10_000,
    );
    this.resendThrottleMs = readBoundedNumber(
      configService,
      'RESEND_THROTTLE_MS',
      1_000,
      0,
      60_000,
    );
  }

  async runConversionChain(input: ConversionChainInput): Promise<boolean> {
    const outcome = await this.executeChain(input);
    return outcome.success;
  }

  /**
   * Pageview (when the visit has closed), ecommerce purchase, goal, then the
   * conversion row. Nothing already sent is retracted when a later step
   * fails; the pageview goes first because it is the cheapest to repeat.
   */
  async executeChain(
    input: ConversionChainInput,
  ): Promise<ConversionChainOutcome> {
    const trail: ConversionChainState[] = ['START'];
    const fail = (failure: ConversionChainFailure): ConversionChainOutcome => {
      trail.push('FAILED');
      return { success: false, trail, failure, duplicate: false };
    };

    if (!this.dispatcher.isConfigured()) {
      this.logger.warn('Metrika not configured, skipping conversion chain');
      return fail('not_configured');
    }

    const tracking = await this.store.getTracking(input.userId);
    if (!tracking) {
      this.logger.log(
        `No tracking found for user ${input.userId}, skipping conversion`,
      );
      return fail('no_tracking');
    }

    trail.push('CHECK_DUPLICATE');
    if (await this.store.hasConversion(input.userId, input.paymentId)) {
      this.logger.log(
        `Conversion already sent for user ${input.userId}, payment ${input.paymentId}`,
      );
      trail.push('DONE');
      return { success: true, trail, failure: null, duplicate: true };
    }

    const pageUrl = this.dispatcher.purchasePageUrl();

    trail.push('CHECK_SESSION');
    const open = isVisitOpen(
      tracking,
      new Date(),
      this.visitWindow.visitCompletionHours,
      this.visitWindow.sessionTimeoutMinutes,
    );
    if (!open) {
      trail.push('OPEN_SESSION');
      const pageviewSent = await this.dispatcher.sendPageview(
        tracking.clientId,
        { pageUrl, title: 'Purchase Completed' },
      );
      if (!pageviewSent) {
        this.logger.error(`Failed to send pageview for user ${input.userId}`);
        return fail('pageview_failed');
      }
      await this.store.touchVisit(tracking.id);
      await this.sleep(this.eventSpacingMs);
    }

    trail.push('SEND_PURCHASE');
    const months = Math.max(1, Math.floor(input.subscriptionMonths));
    const purchaseSent = await this.dispatcher.sendEcommercePurchase(
      tracking.clientId,
      input.paymentId,
      input.amount,
      {
        currency: input.currency,
        pageUrl,
        coupon: input.promoCode ?? undefined,
        products: [
          {
            id: `subscription_${months}m`,
            name: `Subscription ${months} months`,
            category: input.amount > 0 ? 'Subscription' : 'Trial',
            price: input.amount,
            quantity: 1,
            variant: months === 1 ? 'monthly' : `${months}_months`,
          },
        ],
      },
    );
    if (!purchaseSent) {
      this.logger.error(`Failed to send ecommerce data for user ${input.userId}`);
      return fail('purchase_failed');
    }

    trail.push('SEND_GOAL');
    const goalSent = await this.dispatcher.sendEvent(
      tracking.clientId,
      PURCHASE_GOAL_NAME,
      { value: input.amount, currency: input.currency, pageUrl },
    );
    if (!goalSent) {
      this.logger.warn(
        `Goal ${PURCHASE_GOAL_NAME} was not accepted for user ${input.userId}; purchase already recorded remotely`,
      );
    }

    trail.push('PERSIST');
    try {
      await this.store.recordConversion(
        input.userId,
        input.paymentId,
        input.amount,
        input.currency,
      );
      this.logger.log(`Sent full conversion chain for user ${input.userId}`);
    } catch (error) {
      // Hits are already accepted remotely; nothing to roll back.
      this.logger.error(
        `Conversion for user ${input.userId}, payment ${input.paymentId} was sent but not saved`,
        error as Error,
      );
    }

    trail.push('DONE');
    return { success: true, trail, failure: null, duplicate: false };
  }

  async resendMissingConversions(limit = 50): Promise<ResendTally> {
    const safeLimit = Math.min(Math.max(Math.floor(limit), 1), 500);
    const tally: ResendTally = { processed: 0, success: 0, failed: 0 };

    let payments: Payment[];
    try {
      payments = await this.paymentsService.findUnconvertedSucceeded(safeLimit);
    } catch (error) {
      this.logger.error('Failed to load payments for resend', error as Error);
      return tally;
    }

    for (const [index, payment] of payments.entries()) {
      if (index > 0) {
        await this.sleep(this.resendThrottleMs);
      }

      tally.processed += 1;
      try {
        const sent = await this.runConversionChain({
          userId: payment.userId,
          amount: payment.amount,
          paymentId: payment.paymentId,
          subscriptionMonths: payment.subscriptionMonths,
          promoCode: payment.promoCode,
          currency: payment.currency,
        });
        if (sent) {
          tally.success += 1;
        } else {
          tally.failed += 1;
        }
      } catch (error) {
        tally.failed += 1;
        this.logger.error(
          `Resend failed for payment ${payment.paymentId}`,
          error as Error,
        );
      }
    }

    this.logger.log(
      `Resend finished: processed ${tally.processed}, success ${tally.success}, failed ${tally.failed}`,
    );
    return tally;
  }

  async handlePurchaseSignal(
    signal: PurchaseSignal,
  ): Promise<PurchaseSignalResult> {
    const known = await this.paymentsService.findByPaymentId(signal.paymentId);
    const alreadyHandled = known?.status === PaymentStatus.SUCCEEDED;

    await this.paymentsService.recordSucceeded({
      paymentId: signal.paymentId,
      userId: signal.userId,
      amount: signal.amount,
      currency: signal.currency ?? 'RUB',
      subscriptionMonths: signal.subscriptionMonths,
      promoCode: signal.promoCode ?? null,
    });

    const outcome = await this.executeChain(signal);
    const conversionSent = outcome.success;

    // One sale postback per payment.
    let postbackSent = false;
    if (alreadyHandled || outcome.duplicate) {
      this.logger.log(
        `Payment ${signal.paymentId} was already handled, skipping sale postback`,
      );
      return { paymentId: signal.paymentId, conversionSent, postbackSent };
    }

    const subscriber = await this.subscriberRepo.findOne({
      where: { telegramId: signal.userId },
    });
    if (subscriber?.sourceSubId) {
      postbackSent = await this.postbackService.sendPurchase(
        subscriber.sourceSubId,
        signal.amount,
      );
    }

    return { paymentId: signal.paymentId, conversionSent, postbackSent };
  }

  async runSelfTest(): Promise<SelfTestResult> {
    const clientId = Array.from({ length: 19 }, () => randomInt(10)).join('');
    if (!this.dispatcher.isConfigured()) {
      return {
        configured: false,
        clientId,
        pageview: false,
        ecommerce: false,
        goal: false,
      };
    }

    const pageview = await this.dispatcher.sendPageview(clientId, {
      title: 'Test Visit',
    });
    await this.sleep(this.eventSpacingMs);
    const ecommerce = await this.dispatcher.sendEcommercePurchase(
      clientId,
      `test_${Date.now()}`,
      100,
      {
        products: [
          {
            id: 'test_subscription',
            name: 'Test Subscription',
            category: 'Test',
            price: 100,
            quantity: 1,
          },
        ],
      },
    );
    const goal = await this.dispatcher.sendEvent(clientId, 'test_purchase', {
      value: 100,
    });

    return { configured: true, clientId, pageview, ecommerce, goal };
  }
}
