import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { AttributionMaintenanceService } from './attribution-maintenance.service';
import { AttributionStoreService } from './attribution-store.service';

async function createService(env: Record<string, unknown>) {
  const cleanup = jest.fn(async (_days?: number) => 4);
  const moduleRef = await Test.createTestingModule({
    providers: [
      AttributionMaintenanceService,
      { provide: AttributionStoreService, useValue: { cleanup } },
      { provide: ConfigService, useValue: new ConfigService(env) },
    ],
  }).compile();
  return { service: moduleRef.get(AttributionMaintenanceService), cleanup };
}

describe('AttributionMaintenanceService', () => {
  it('purges with the configured retention', async () => {
    const { service, cleanup } = await createService({
      TRACKING_RETENTION_DAYS: 14,
    });

    await expect(service.purgeStaleTracking()).resolves.toBe(4);
    expect(cleanup).toHaveBeenCalledWith(14);
  });

  it('stays idle without a retention period', async () => {
    const { service, cleanup } = await createService({});

    await expect(service.purgeStaleTracking()).resolves.toBeNull();
    expect(cleanup).not.toHaveBeenCalled();
  });

  it('swallows a failed run so the schedule keeps going', async () => {
    const { service, cleanup } = await createService({
      TRACKING_RETENTION_DAYS: 14,
    });
    cleanup.mockRejectedValueOnce(new Error('database unavailable'));

    await expect(service.purgeStaleTracking()).resolves.toBeNull();
  });
});
