import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import { promises as fs } from 'fs';
import { AppConfig } from '../../config/configuration';

export interface DiskUsage {
  total: number;
  free: number;
  freePercent: number;
}

/**
 * Free space of the filesystem holding the tools' temp dir; downloads and
 * transcodes land there before they are streamed out.
 */
@Injectable()
export class DiskSpaceHealthIndicator extends HealthIndicator {
  private readonly tempDir: string;
  private readonly minFreeSpacePercent = 10;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    super();
    this.tempDir = this.configService.getOrThrow('tools', { infer: true }).tempDir;
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    let diskInfo: DiskUsage;
    try {
      await fs.mkdir(this.tempDir, { recursive: true });
      diskInfo = await this.getDiskUsage(this.tempDir);
    } catch (error) {
      throw new HealthCheckError(
        'Disk space check failed',
        this.getStatus(key, false, {
          path: this.tempDir,
          error: error instanceof Error ? error.message : String(error),
        }),
      );
    }

    const details = {
      path: this.tempDir,
      totalBytes: diskInfo.total,
      freeBytes: diskInfo.free,
      freePercent: Number(diskInfo.freePercent.toFixed(1)),
    };

    if (diskInfo.freePercent >= this.minFreeSpacePercent) {
      return this.getStatus(key, true, details);
    }

    throw new HealthCheckError(
      `Low disk space: ${diskInfo.freePercent.toFixed(1)}% free`,
      this.getStatus(key, false, details),
    );
  }

  protected async getDiskUsage(dir: string): Promise<DiskUsage> {
    const stats = await fs.statfs(dir);
    const total = stats.blocks * stats.bsize;
    const free = stats.bavail * stats.bsize;
    return { total, free, freePercent: total > 0 ? (free / total) * 100 : 0 };
  }
}
