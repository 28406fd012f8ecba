import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { PrimaryStore } from '../store/primary.store';

export interface StoreCheck {
  status: 'up' | 'down';
  responseTime?: number;
  error?: string;
}

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  checks: {
    primaryStore: StoreCheck;
    referenceStore: StoreCheck;
  };
}

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(
    @InjectDataSource() private dataSource: DataSource,
    private primaryStore: PrimaryStore,
  ) {
    this.startTime = Date.now();
  }

  async checkHealth(): Promise<HealthCheckResult> {
    const [primaryStore, referenceStore] = await Promise.all([
      this.check(() => this.primaryStore.ping(), 'Primary store unreachable'),
      this.check(() => this.dataSource.query('SELECT 1'), 'Reference store unreachable'),
    ]);

    return {
      status: primaryStore.status === 'up' && referenceStore.status === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      checks: { primaryStore, referenceStore },
    };
  }

  private async check(probe: () => Promise<unknown>, fallbackMessage: string): Promise<StoreCheck> {
    try {
      const start = Date.now();
      await probe();
      return { status: 'up', responseTime: Date.now() - start };
    } catch (error) {
      return {
        status: 'down',
        error: error instanceof Error && error.message ? error.message : fallbackMessage,
      };
    }
  }
}
