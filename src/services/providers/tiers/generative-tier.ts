// Tier 3: schema-constrained generation. Last resort; nothing runs after it.
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { withTimeout } from '@/utils/abort';
import type { GenerativeBackend } from '../generative/generative-backend';
import { parseModelJson } from '../generative/model-json';
import { GENERATION_SYSTEM, GENERATION_TEMPLATES, type GenerationTemplate } from '../generative/prompts';
import type {
  RetrievalCategory,
  RetrievalParams,
  RetrievalPayloads,
  RetrievalQuery,
  TierAttempt,
  TierStrategy,
} from '../retrieval-types';

export interface GenerativeTierOptions {
  timeoutMs: number;
}

export class GenerativeTier implements TierStrategy {
  readonly provenance = 'generated' as const;

  constructor(
    private readonly backend: GenerativeBackend | null,
    private readonly options: GenerativeTierOptions,
  ) {}

  supports(): boolean {
    return this.backend !== null;
  }

  async attempt<C extends RetrievalCategory>(
    query: RetrievalQuery<C>,
    signal?: AbortSignal,
  ): Promise<TierAttempt<RetrievalPayloads[C]>> {
    const backend = this.backend;
    if (!backend) return { status: 'miss', reason: 'no generative backend configured' };

    const template: GenerationTemplate<RetrievalParams[C], RetrievalPayloads[C]> =
      GENERATION_TEMPLATES[query.category];
    const context = `generative:${query.category}`;

    let raw: string;
    try {
      raw = await withTimeout(
        (s) =>
          backend.generate({
            system: GENERATION_SYSTEM,
            prompt: template.prompt(query.params),
            schemaName: template.schemaName,
            jsonSchema: template.jsonSchema,
            signal: s,
          }),
        this.options.timeoutMs,
        context,
        signal,
      );
    } catch (err) {
      return { status: 'error', reason: `backend: ${errorMessage(err)}` };
    }

    const parsed = parseModelJson(raw);
    if (!parsed.ok) {
      logger.warn('generative:unparsable', { category: query.category, reason: parsed.reason, raw: raw.slice(0, 300) });
      return { status: 'error', reason: `unparsable output: ${parsed.reason}` };
    }

    const validated = template.parse(parsed.value);
    if (!validated.ok) {
      logger.warn('generative:schema_invalid', { category: query.category, error: validated.error });
      return { status: 'error', reason: `schema-invalid output: ${validated.error}` };
    }
    return { status: 'hit', payload: validated.data };
  }
}
