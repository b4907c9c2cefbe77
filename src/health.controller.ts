import { Controller, Get } from '@nestjs/common';
import { OllamaService } from './modules/ollama/ollama.service';

@Controller('health')
export class HealthController {
  constructor(private readonly ollamaService: OllamaService) {}

  @Get()
  check() {
    const ai = this.ollamaService.getStatus();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      ai: {
        enabled: ai.enabled,
        ready: ai.ready,
        models: ai.models,
        missingModels: ai.missingModels,
      },
    };
  }
}
