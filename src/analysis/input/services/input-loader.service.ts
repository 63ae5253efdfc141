/**
 * Input Loader Service
 *
 * Resolves the job for a run. input.json wins when present; otherwise the
 * PDFs of the folder are discovered and the query is asked interactively.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access, readFile } from 'fs/promises';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { AnalysisJob } from '../../common/types';
import { AnalysisInputDto } from '../dto/analysis-input.dto';
import { InvalidInputError } from '../errors/input-errors';
import { AnalysisPaths, resolveAnalysisPaths } from '../analysis-paths';
import {
  DocumentDiscoveryService,
  titleFromFilename,
} from './document-discovery.service';
import { AskFn, InteractiveSetupService } from './interactive-setup.service';

export interface LoadedInput {
  job: AnalysisJob;
  paths: AnalysisPaths;
  source: 'file' | 'interactive';
}

@Injectable()
export class InputLoaderService {
  private readonly logger = new Logger(InputLoaderService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly discovery: DocumentDiscoveryService,
    private readonly setup: InteractiveSetupService,
  ) {}

  get paths(): AnalysisPaths {
    return resolveAnalysisPaths(this.configService);
  }

  /**
   * @throws InvalidInputError if input.json exists but is malformed
   * @throws NoDocumentsError if there is no input.json and no PDF to analyse
   */
  async load(ask?: AskFn): Promise<LoadedInput> {
    const paths = this.paths;

    if (await this.exists(paths.inputFile)) {
      this.logger.log(`Loading job from ${paths.inputFile}`);
      return {
        job: await this.readInputFile(paths.inputFile),
        paths,
        source: 'file',
      };
    }

    this.logger.log(
      `No ${paths.inputFile} found, discovering PDFs in ${paths.pdfFolder}`,
    );

    const documents = await this.discovery.discover(paths.pdfFolder);
    const query = await this.setup.promptQuery(ask);

    return { job: { documents, query }, paths, source: 'interactive' };
  }

  async readInputFile(filePath: string): Promise<AnalysisJob> {
    let parsed: unknown;

    try {
      parsed = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      throw new InvalidInputError(
        filePath,
        [cause ? cause.message : String(error)],
        cause,
      );
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new InvalidInputError(filePath, ['expected a JSON object']);
    }

    const dto = plainToInstance(AnalysisInputDto, parsed);
    const errors = await validate(dto);

    if (errors.length > 0) {
      throw new InvalidInputError(filePath, flattenValidationErrors(errors));
    }

    const description = dto.challenge_info?.description?.trim();

    return {
      documents: dto.documents.map((doc) => ({
        filename: doc.filename,
        title: doc.title?.trim() || titleFromFilename(doc.filename),
      })),
      query: {
        role: dto.persona.role.trim(),
        task: dto.job_to_be_done.task.trim(),
        ...(description ? { description } : {}),
      },
    };
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = '',
): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    return [...own, ...flattenValidationErrors(error.children ?? [], path)];
  });
}
