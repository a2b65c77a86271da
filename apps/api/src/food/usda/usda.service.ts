import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../../config/config.schema';
import { USDA_DATA_TYPES, usdaSearchResponseSchema, type UsdaFood } from './usda.types';

@Injectable()
export class UsdaService {
  private readonly logger = new Logger(UsdaService.name);

  constructor(private readonly config: ConfigService<AppConfig, true>) {}

  /**
   * Best FoodData Central match for a free-text query, or null when nothing matches.
   * Transport failures, non-2xx statuses and malformed bodies throw.
   */
  async searchBestMatch(label: string): Promise<UsdaFood | null> {
    const q = label.trim();
    if (!q) return null;

    const base = this.config.get('USDA_BASE_URL', { infer: true }).replace(/\/$/, '');
    const params = new URLSearchParams({
      api_key: this.config.get('USDA_API_KEY', { infer: true }),
      query: q,
      pageSize: '1',
      sortBy: 'dataType.keyword',
      sortOrder: 'desc',
    });
    USDA_DATA_TYPES.forEach((t) => params.append('dataType', t));

    const controller = new AbortController();
    const timeoutMs = this.config.get('USDA_TIMEOUT_MS', { infer: true });
    const to = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const r = await fetch(`${base}/foods/search?${params.toString()}`, {
        method: 'GET',
        headers: { accept: 'application/json' },
        signal: controller.signal,
      });
      if (!r.ok) {
        const t = await r.text().catch(() => '');
        throw new Error(`usda_error_${r.status}${t ? `: ${t.slice(0, 200)}` : ''}`);
      }

      const parsed = usdaSearchResponseSchema.safeParse(await r.json());
      if (!parsed.success) {
        throw new Error(`usda_bad_response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
      }

      const [first] = parsed.data.foods;
      if (first) {
        this.logger.debug(`USDA match for "${q}": ${first.description} (fdcId ${first.fdcId})`);
      }
      return first ?? null;
    } catch (e) {
      if (controller.signal.aborted) {
        throw new Error(`usda_timeout after ${timeoutMs}ms`);
      }
      throw e;
    } finally {
      clearTimeout(to);
    }
  }
}
