/**
 * Interactive Setup Service
 *
 * Asks for the persona role, task and an optional description on the
 * terminal, and writes input.json for later runs (--setup).
 */

import { Injectable, Logger } from '@nestjs/common';
import { writeFile } from 'fs/promises';
import { createInterface } from 'readline/promises';
import { DocumentRef } from '../../stages/extract/types';
import { Query } from '../../stages/rank/types';
import { AnalysisInputDto } from '../dto/analysis-input.dto';

export type AskFn = (question: string) => Promise<string>;

export const DEFAULT_ROLE = 'Analyst';
export const DEFAULT_TASK = 'Analyze and summarize key information';

@Injectable()
export class InteractiveSetupService {
  private readonly logger = new Logger(InteractiveSetupService.name);

  /**
   * Prompt for the query. Blank answers fall back to the defaults.
   *
   * @param ask reads one answer; defaults to a readline prompt on stdin
   */
  async promptQuery(ask?: AskFn): Promise<Query> {
    if (ask) {
      return this.collectQuery(ask);
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await this.collectQuery((question) => rl.question(question));
    } finally {
      rl.close();
    }
  }

  buildInputFile(
    documents: DocumentRef[],
    query: Query,
    now: Date = new Date(),
  ): AnalysisInputDto {
    return {
      challenge_info: {
        challenge_id: `user_analysis_${formatStamp(now)}`,
        test_case_name: 'user_defined_analysis',
        description: query.description,
      },
      documents: documents.map((doc) => ({
        filename: doc.filename,
        title: doc.title,
      })),
      persona: { role: query.role },
      job_to_be_done: { task: query.task },
    };
  }

  async writeInputFile(
    filePath: string,
    documents: DocumentRef[],
    query: Query,
  ): Promise<void> {
    const input = this.buildInputFile(documents, query);
    await writeFile(filePath, `${JSON.stringify(input, null, 2)}\n`, 'utf-8');

    this.logger.log(
      `Created ${filePath}: role "${query.role}", task "${query.task}", ` +
        `${documents.length} documents`,
    );
  }

  private async collectQuery(ask: AskFn): Promise<Query> {
    const role =
      (
        await ask(
          'What is your role? (e.g. Travel Planner, Research Scientist, Legal Analyst)\nYour role: ',
        )
      ).trim() || DEFAULT_ROLE;

    const task =
      (
        await ask(
          'What do you want to find or analyze in your PDF documents?\nYour task/question: ',
        )
      ).trim() || DEFAULT_TASK;

    const description =
      (await ask('Project description (optional): ')).trim() ||
      `Document analysis for ${role.toLowerCase()}`;

    return { role, task, description };
  }
}

function formatStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
