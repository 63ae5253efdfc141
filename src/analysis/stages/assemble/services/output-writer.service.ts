/**
 * Output Writer Service
 * Persists the analysis artifact as pretty-printed UTF-8 JSON
 */

import { Injectable, Logger } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { AnalysisOutput } from '../types';

@Injectable()
export class OutputWriterService {
  private readonly logger = new Logger(OutputWriterService.name);

  async write(filePath: string, output: AnalysisOutput): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(output, null, 2)}\n`, 'utf-8');

    this.logger.log(
      `Output saved to ${filePath} (${output.extracted_sections.length} sections)`,
    );
  }
}
