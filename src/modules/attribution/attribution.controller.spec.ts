import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { INTERNAL_TOKEN_HEADER } from '../../common/guards/internal-token.guard';
import { AttributionController } from './attribution.controller';
import { AttributionStoreService } from './attribution-store.service';
import { ConversionChainService } from './conversion-chain.service';
import { sqliteTestingModules } from '../../testing/sqlite-typeorm';
import { ConversionRecord } from './entities/conversion-record.entity';
import { TrackingRecord } from './entities/tracking-record.entity';

const TOKEN = 'test-internal-token';
const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

async function startApp(moduleRef: TestingModule) {
  const app = moduleRef.createNestApplication<NestFastifyApplication>(
    new FastifyAdapter(),
  );
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.setGlobalPrefix('v1');
  await app.init();
  await app.getHttpAdapter().getInstance().ready();
  return app;
}

describe('AttributionController', () => {
  let app: NestFastifyApplication;
  const store = {
    statistics: jest.fn(),
    topVisitors: jest.fn(),
    cleanup: jest.fn(),
  };
  const chain = {
    handlePurchaseSignal: jest.fn(),
    resendMissingConversions: jest.fn(),
    runSelfTest: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [AttributionController],
      providers: [
        { provide: AttributionStoreService, useValue: store },
        { provide: ConversionChainService, useValue: chain },
        {
          provide: ConfigService,
          useValue: new ConfigService({ INTERNAL_API_TOKEN: TOKEN }),
        },
      ],
    }).compile();

    app = await startApp(moduleRef);
  });

  afterEach(async () => {
    await app.close();
  });

  it('rejects calls without the internal token', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/v1/attribution/stats',
    });

    expect(response.statusCode).toBe(401);
    expect(store.statistics).not.toHaveBeenCalled();
  });

  it('rejects calls with a wrong token', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/v1/attribution/stats',
      headers: { [INTERNAL_TOKEN_HEADER]: 'wrong-token-value' },
    });

    expect(response.statusCode).toBe(401);
  });

  it('hands a purchase signal to the conversion chain', async () => {
    chain.handlePurchaseSignal.mockResolvedValue({
      paymentId: 'pay_1',
      conversionSent: true,
      postbackSent: false,
    });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/attribution/purchases',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
      payload: {
        userId: 100,
        paymentId: 'pay_1',
        amount: 499,
        subscriptionMonths: 1,
        currency: 'rub',
      },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      paymentId: 'pay_1',
      conversionSent: true,
      postbackSent: false,
    });
    expect(chain.handlePurchaseSignal).toHaveBeenCalledWith({
      userId: '100',
      paymentId: 'pay_1',
      amount: 499,
      subscriptionMonths: 1,
      currency: 'RUB',
      promoCode: null,
    });
  });

  it('validates the purchase signal', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/attribution/purchases',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
      payload: {
        userId: 'someone',
        paymentId: 'pay_1',
        amount: 499,
        subscriptionMonths: 0,
      },
    });

    expect(response.statusCode).toBe(400);
    expect(chain.handlePurchaseSignal).not.toHaveBeenCalled();
  });

  it('lists top visitors with hours since their last visit', async () => {
    store.topVisitors.mockResolvedValue([
      Object.assign(new TrackingRecord(), {
        userId: '100',
        visitCount: 7,
        lastVisitTime: new Date(Date.now() - 2 * HOUR_MS),
      }),
      Object.assign(new TrackingRecord(), {
        userId: '200',
        visitCount: 1,
        lastVisitTime: null,
      }),
    ]);

    const response = await app.inject({
      method: 'GET',
      url: '/v1/attribution/visitors/top?limit=5',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
    });

    expect(response.statusCode).toBe(200);
    expect(store.topVisitors).toHaveBeenCalledWith(5);
    const [first, second] = response.json();
    expect(first).toMatchObject({
      userId: '100',
      visitCount: 7,
      hoursSinceLastVisit: 2,
    });
    expect(second).toEqual({
      userId: '200',
      visitCount: 1,
      lastVisitTime: null,
      hoursSinceLastVisit: null,
    });
  });

  it('cleans up thirty days back by default', async () => {
    store.cleanup.mockResolvedValue(3);

    const response = await app.inject({
      method: 'POST',
      url: '/v1/attribution/cleanup',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
      payload: {},
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ days: 30, deleted: 3 });
    expect(store.cleanup).toHaveBeenCalledWith(30);
  });

  it('passes the resend limit through', async () => {
    chain.resendMissingConversions.mockResolvedValue({
      processed: 0,
      success: 0,
      failed: 0,
    });

    const response = await app.inject({
      method: 'POST',
      url: '/v1/attribution/conversions/resend',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
      payload: { limit: 10 },
    });

    expect(response.statusCode).toBe(200);
    expect(chain.resendMissingConversions).toHaveBeenCalledWith(10);
  });
});

describe('AttributionController with the sqlite store', () => {
  let app: NestFastifyApplication;
  let trackingRepo: Repository<TrackingRecord>;
  let conversionRepo: Repository<ConversionRecord>;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: sqliteTestingModules([TrackingRecord, ConversionRecord]),
      controllers: [AttributionController],
      providers: [
        AttributionStoreService,
        { provide: ConversionChainService, useValue: {} },
        {
          provide: ConfigService,
          useValue: new ConfigService({ INTERNAL_API_TOKEN: TOKEN }),
        },
      ],
    }).compile();

    trackingRepo = moduleRef.get<Repository<TrackingRecord>>(
      getRepositoryToken(TrackingRecord),
    );
    conversionRepo = moduleRef.get<Repository<ConversionRecord>>(
      getRepositoryToken(ConversionRecord),
    );
    app = await startApp(moduleRef);
  });

  afterEach(async () => {
    await app.close();
  });

  const seedTracking = (userId: string, lastVisitTime: Date) =>
    trackingRepo.save(
      trackingRepo.create({
        userId,
        clientId: '1234567890',
        counterId: '98765432',
        firstVisitTime: lastVisitTime,
        lastVisitTime,
        visitCount: 1,
      }),
    );

  it('deletes only stale records of unconverted users', async () => {
    await seedTracking('100', new Date(Date.now() - 31 * DAY_MS));
    await seedTracking('200', new Date(Date.now() - 31 * DAY_MS));
    await seedTracking('300', new Date());
    await conversionRepo.save(
      conversionRepo.create({
        userId: '200',
        paymentId: 'pay_1',
        amount: 499,
        currency: 'RUB',
        sentAt: new Date(),
      }),
    );

    const response = await app.inject({
      method: 'POST',
      url: '/v1/attribution/cleanup',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
      payload: { days: 30 },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ days: 30, deleted: 1 });
    const remaining = await trackingRepo.find({ order: { userId: 'ASC' } });
    expect(remaining.map((record) => record.userId)).toEqual(['200', '300']);
  });

  it('reports statistics from stored rows', async () => {
    await seedTracking('100', new Date());

    const response = await app.inject({
      method: 'GET',
      url: '/v1/attribution/stats',
      headers: { [INTERNAL_TOKEN_HEADER]: TOKEN },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      totalTrackings: 1,
      conversionsSent: 0,
      totalVisits: 1,
    });
  });
});
