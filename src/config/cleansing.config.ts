import { registerAs } from '@nestjs/config';

export interface CleansingConfig {
  concurrency: number;
  ageMin: number;
  ageMax: number;
  decadeOffsets: { early: number; mid: number; late: number };
  samplePath: string;
}

export default registerAs('cleansing', (): CleansingConfig => ({
  concurrency: parseInt(process.env.CLEANSE_CONCURRENCY || '4', 10),
  ageMin: parseInt(process.env.CLEANSE_AGE_MIN || '0', 10),
  ageMax: parseInt(process.env.CLEANSE_AGE_MAX || '120', 10),
  decadeOffsets: {
    early: parseInt(process.env.CLEANSE_DECADE_EARLY || '2', 10),
    mid: parseInt(process.env.CLEANSE_DECADE_MID || '5', 10),
    late: parseInt(process.env.CLEANSE_DECADE_LATE || '8', 10),
  },
  samplePath: process.env.CLEANSE_SAMPLE_PATH || 'data/sample-demographics.json',
}));
