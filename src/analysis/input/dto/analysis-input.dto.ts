/**
 * Analysis Input DTO
 * Shape of input.json
 */

import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

export class ChallengeInfoDto {
  @IsOptional()
  @IsString()
  declare challenge_id?: string;

  @IsOptional()
  @IsString()
  declare test_case_name?: string;

  @IsOptional()
  @IsString()
  declare description?: string;
}

export class InputDocumentDto {
  @IsString()
  @IsNotEmpty()
  declare filename: string;

  @IsOptional()
  @IsString()
  declare title?: string;
}

export class PersonaDto {
  @IsString()
  @IsNotEmpty()
  declare role: string;
}

export class JobToBeDoneDto {
  @IsString()
  @IsNotEmpty()
  declare task: string;
}

export class AnalysisInputDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => ChallengeInfoDto)
  declare challenge_info?: ChallengeInfoDto;

  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => InputDocumentDto)
  declare documents: InputDocumentDto[];

  @ValidateNested()
  @Type(() => PersonaDto)
  declare persona: PersonaDto;

  @ValidateNested()
  @Type(() => JobToBeDoneDto)
  declare job_to_be_done: JobToBeDoneDto;
}
