/**
 * Ollama Classifier Adapter
 *
 * Implements the two-operation classifier contract on top of plain LLM
 * completions. The model is asked for a bare answer; anything that does
 * not fit the contract is coerced here (fallback label / INVALID) and
 * logged as a data-quality signal. Transport failures surface as
 * ClassifierUnavailableError.
 */

import { Injectable, Logger } from '@nestjs/common';
import { OllamaRequestError, OllamaService } from '../../ollama/ollama.service';
import { ClassifierUnavailableError } from '../engine/errors';
import {
  INVALID_SENTINEL,
  type ClassifierAdapter,
  type ClassifyRequest,
  type ExtractNumberRequest,
} from './classifier-adapter';

const BARE_INTEGER = /^\d+$/;

@Injectable()
export class OllamaClassifierAdapter implements ClassifierAdapter {
  private readonly logger = new Logger(OllamaClassifierAdapter.name);

  constructor(private readonly ollama: OllamaService) {}

  async classify(request: ClassifyRequest): Promise<string> {
    const { field, value, labels, fallback } = request;

    const prompt = `You are a data-cleansing classifier for demographic records. Map the ${field} value below to exactly ONE of the allowed categories.

ALLOWED CATEGORIES:
${labels.map((l) => `- ${l}`).join('\n')}

RULES:
- Abbreviations, synonyms and informal terms map to their category (e.g. "M" -> Male, "Caucasian" -> White)
- If the value does not clearly fit any category, answer ${fallback}
- Respond with ONLY the category name exactly as written above, no explanation

VALUE: "${value}"`;

    const raw = await this.complete(this.ollama.modelFor(field), prompt, 24);
    const answer = normalizeAnswer(raw).toUpperCase();
    const label = labels.find((l) => l.toUpperCase() === answer);

    if (label === undefined) {
      this.logger.warn(`Malformed ${field} classification "${truncate(raw)}" for "${value}", coerced to ${fallback}`);
      return fallback;
    }
    return label;
  }

  async extractNumber(request: ExtractNumberRequest): Promise<string> {
    const { field, value, instruction } = request;
    const prompt = `${instruction}\n\nVALUE: "${value}"`;

    const raw = await this.complete(this.ollama.modelFor(field), prompt, 8);
    const answer = normalizeAnswer(raw);

    if (BARE_INTEGER.test(answer)) return answer;
    if (answer.toUpperCase() === INVALID_SENTINEL) return INVALID_SENTINEL;

    this.logger.warn(`Malformed ${field} extraction "${truncate(raw)}" for "${value}", coerced to ${INVALID_SENTINEL}`);
    return INVALID_SENTINEL;
  }

  private async complete(model: string, prompt: string, maxTokens: number): Promise<string> {
    try {
      return await this.ollama.generate(model, prompt, { temperature: 0, maxTokens });
    } catch (err) {
      if (err instanceof OllamaRequestError) {
        throw new ClassifierUnavailableError(err.message, { model: err.model, timedOut: err.timedOut });
      }
      throw err;
    }
  }
}

// Strip wrapping quotes, backticks, bold markers and a trailing period.
function normalizeAnswer(raw: string): string {
  return raw
    .trim()
    .replace(/^[`"'*]+|[`"'*]+$/g, '')
    .replace(/\.$/, '')
    .trim();
}

function truncate(s: string, max = 80): string {
  return s.length > max ? `${s.substring(0, max)}…` : s;
}
