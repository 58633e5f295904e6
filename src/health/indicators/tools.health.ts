import { Inject, Injectable } from '@nestjs/common';
import {
  HealthIndicator,
  HealthIndicatorResult,
  HealthCheckError,
} from '@nestjs/terminus';
import {
  ExternalToolRunnerPort,
  ToolVersions,
} from '../../application/ports/output/external-tool-runner.port';
import { EXTERNAL_TOOL_RUNNER_PORT } from '../../infrastructure/infrastructure.module';

const PROBE_CACHE_TTL_MS = 60_000;

/**
 * Readiness of yt-dlp and ffmpeg. Probing spawns both tools, so a result is
 * reused for a minute.
 */
@Injectable()
export class ToolsHealthIndicator extends HealthIndicator {
  private cached?: { versions: ToolVersions; probedAt: number };

  constructor(
    @Inject(EXTERNAL_TOOL_RUNNER_PORT) private readonly toolRunner: ExternalToolRunnerPort,
  ) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    const versions = await this.getVersions();
    const details = { ytDlp: versions.ytDlp, ffmpeg: versions.ffmpeg };

    const missing = Object.entries(details)
      .filter(([, version]) => version === null)
      .map(([tool]) => tool);

    if (missing.length === 0) {
      return this.getStatus(key, true, details);
    }

    this.cached = undefined;
    throw new HealthCheckError(
      `External tools unavailable: ${missing.join(', ')}`,
      this.getStatus(key, false, details),
    );
  }

  private async getVersions(): Promise<ToolVersions> {
    if (this.cached && Date.now() - this.cached.probedAt < PROBE_CACHE_TTL_MS) {
      return this.cached.versions;
    }
    const versions = await this.toolRunner.probeVersions();
    this.cached = { versions, probedAt: Date.now() };
    return versions;
  }
}
