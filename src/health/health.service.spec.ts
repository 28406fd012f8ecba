import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { HealthService } from './health.service';
import { PrimaryStore } from '../store/primary.store';

describe('HealthService', () => {
  let service: HealthService;
  let dataSource: { query: jest.Mock };
  let primaryStore: { ping: jest.Mock };

  beforeEach(async () => {
    dataSource = { query: jest.fn().mockResolvedValue([{ '?column?': 1 }]) };
    primaryStore = { ping: jest.fn().mockResolvedValue(undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: PrimaryStore, useValue: primaryStore },
      ],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  it('should be healthy when both stores answer', async () => {
    const health = await service.checkHealth();

    expect(health.status).toBe('healthy');
    expect(health.checks.primaryStore.status).toBe('up');
    expect(health.checks.referenceStore.status).toBe('up');
    expect(dataSource.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should be unhealthy when the primary store is down', async () => {
    primaryStore.ping.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:6379'));

    const health = await service.checkHealth();

    expect(health.status).toBe('unhealthy');
    expect(health.checks.primaryStore).toEqual({ status: 'down', error: 'connect ECONNREFUSED 127.0.0.1:6379' });
    expect(health.checks.referenceStore.status).toBe('up');
  });

  it('should fall back to a generic message for non-error failures', async () => {
    dataSource.query.mockRejectedValue('boom');

    const health = await service.checkHealth();

    expect(health.checks.referenceStore).toEqual({ status: 'down', error: 'Reference store unreachable' });
  });
});
