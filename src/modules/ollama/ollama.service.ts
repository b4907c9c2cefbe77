import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import type { FieldName } from '../cleansing/engine/types';

// ── Types ─────────────────────────────────────────────────────────────

interface OllamaGenerateRequest {
  model: string;
  prompt: string;
  stream: false;
  options?: {
    temperature?: number;
    top_p?: number;
    num_predict?: number;
  };
}

interface OllamaGenerateResponse {
  response: string;
  done: boolean;
}

interface OllamaTagsResponse {
  models?: { name: string }[];
}

export type FieldModels = Record<FieldName, string>;

export interface OllamaStatus {
  enabled: boolean;
  ready: boolean;
  baseUrl: string;
  models: FieldModels;
  missingModels: string[];
}

/** A generate call that produced no usable answer (network, timeout, HTTP). */
export class OllamaRequestError extends Error {
  constructor(
    message: string,
    readonly model: string,
    readonly timedOut = false,
  ) {
    super(message);
    this.name = OllamaRequestError.name;
  }
}

// ── Service ───────────────────────────────────────────────────────────

@Injectable()
export class OllamaService implements OnModuleInit {
  private readonly logger = new Logger(OllamaService.name);
  private readonly baseUrl: string;
  private readonly models: FieldModels;
  private readonly timeout: number;
  private readonly enabled: boolean;
  private readonly autoPull: boolean;
  private ready = false;
  private missingModels: string[] = [];

  constructor(private readonly configService: ConfigService) {
    const fallbackModel = 'llama3.2:3b';
    this.baseUrl = this.configService.get<string>('ollama.url', 'http://localhost:11434');
    this.models = {
      sex: this.configService.get<string>('ollama.models.sex', fallbackModel),
      race: this.configService.get<string>('ollama.models.race', fallbackModel),
      age: this.configService.get<string>('ollama.models.age', fallbackModel),
    };
    this.timeout = this.configService.get<number>('ollama.timeout', 30000);
    this.enabled = this.configService.get<boolean>('ollama.enabled', true);
    this.autoPull = this.configService.get<boolean>('ollama.autoPull', false);
  }

  async onModuleInit() {
    if (!this.enabled) {
      this.logger.warn('Ollama AI is DISABLED via config, every non-canonical value will go to review');
      return;
    }
    await this.ensureModels();
  }

  // ── Model bootstrap ─────────────────────────────────────────────────

  private async ensureModels(): Promise<void> {
    const maxRetries = 3;
    const retryDelay = 2000;
    const wanted = [...new Set(Object.values(this.models))];

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const res = await axios.get<OllamaTagsResponse>(`${this.baseUrl}/api/tags`, { timeout: this.timeout });
        const installed = (res.data.models ?? []).map((m) => m.name);
        const missing = wanted.filter((model) => !isInstalled(model, installed));

        for (const model of missing) {
          if (this.autoPull) {
            await this.pullModel(model);
          } else {
            this.logger.warn(`Model "${model}" is not installed and OLLAMA_AUTO_PULL is off`);
          }
        }

        this.missingModels = this.autoPull ? [] : missing;
        this.ready = this.missingModels.length === 0;
        if (this.ready) this.logger.log(`Ollama models ready: ${wanted.join(', ')}`);
        return;
      } catch (err) {
        const errorMsg = err instanceof Error ? err.message : String(err);
        if (attempt < maxRetries) {
          this.logger.warn(`Ollama connection attempt ${attempt}/${maxRetries} failed at ${this.baseUrl}: ${errorMsg}, retrying in ${retryDelay}ms...`);
          await new Promise((resolve) => setTimeout(resolve, retryDelay));
        } else {
          this.logger.warn(`Ollama not reachable at ${this.baseUrl} after ${maxRetries} attempts (${errorMsg}); affected fields will be routed to review`);
          this.ready = false;
        }
      }
    }
  }

  private async pullModel(model: string): Promise<void> {
    this.logger.log(`Model "${model}" not found, pulling (this may take a few minutes)...`);
    await axios.post(
      `${this.baseUrl}/api/pull`,
      { name: model, stream: false },
      { timeout: 10 * 60 * 1000 }, // 10 min for pull
    );
    this.logger.log(`Model "${model}" pulled successfully`);
  }

  // ── Generate ────────────────────────────────────────────────────────

  /**
   * Run a single non-streaming completion. Rejects with OllamaRequestError
   * when the service is disabled, unreachable, slow or answers with an error.
   */
  async generate(
    model: string,
    prompt: string,
    opts?: { temperature?: number; maxTokens?: number },
  ): Promise<string> {
    if (!this.enabled) {
      throw new OllamaRequestError('Ollama is disabled', model);
    }

    const body: OllamaGenerateRequest = {
      model,
      prompt,
      stream: false,
      options: {
        temperature: opts?.temperature ?? 0,
        top_p: 0.9,
        num_predict: opts?.maxTokens ?? 16,
      },
    };

    try {
      const res = await axios.post<OllamaGenerateResponse>(`${this.baseUrl}/api/generate`, body, {
        timeout: this.timeout,
      });
      return (res.data.response ?? '').trim();
    } catch (err) {
      const timedOut = axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
      const message = err instanceof Error ? err.message : String(err);
      throw new OllamaRequestError(
        timedOut ? `Ollama request timed out after ${this.timeout}ms` : `Ollama request failed: ${message}`,
        model,
        timedOut,
      );
    }
  }

  modelFor(field: FieldName): string {
    return this.models[field];
  }

  /** Check if AI is available and ready */
  isReady(): boolean {
    return this.enabled && this.ready;
  }

  getStatus(): OllamaStatus {
    return {
      enabled: this.enabled,
      ready: this.isReady(),
      baseUrl: this.baseUrl,
      models: { ...this.models },
      missingModels: [...this.missingModels],
    };
  }
}

// "llama3.2" matches an installed "llama3.2:latest".
function isInstalled(model: string, installed: string[]): boolean {
  return installed.some((name) => name === model || name === `${model}:latest`);
}
