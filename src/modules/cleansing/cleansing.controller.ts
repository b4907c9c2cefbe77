/**
 * Cleansing Controller
 *
 * Endpoints:
 *   POST /cleansing/runs         — Cleanse the records in the request body.
 *   POST /cleansing/runs/sample  — Cleanse the bundled sample dataset.
 *   GET  /cleansing/labels       — Canonical vocabulary and age bounds.
 */

import { Body, Controller, Get, HttpCode, Post } from '@nestjs/common';
import { CleansingService } from './cleansing.service';
import { RunCleansingDto } from './dto/run-cleansing.dto';
import { ArrayRecordSource } from './io/record-source';

@Controller('cleansing')
export class CleansingController {
  constructor(private readonly cleansingService: CleansingService) {}

  @Post('runs')
  @HttpCode(200)
  async run(@Body() dto: RunCleansingDto) {
    const source = ArrayRecordSource.fromRows(dto.records);
    const result = await this.cleansingService.run(source, { concurrency: dto.concurrency });
    return { success: true, data: result };
  }

  @Post('runs/sample')
  @HttpCode(200)
  async runSample() {
    const result = await this.cleansingService.runSample();
    return { success: true, data: result };
  }

  @Get('labels')
  labels() {
    return { success: true, data: this.cleansingService.vocabulary() };
  }
}
