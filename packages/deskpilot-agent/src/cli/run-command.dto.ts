import { plainToInstance, Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const MAX_STEPS_LIMIT = 100;

export class RunCommandDto {
  @IsNotEmpty()
  @IsString()
  goal!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(MAX_STEPS_LIMIT)
  maxSteps?: number;
}

export interface RawRunArguments {
  goal: string;
  maxSteps?: string;
}

/**
 * Splits argv into the goal (all positional words) and `--max-steps N` or
 * `--max-steps=N`.
 */
export function parseRunArguments(argv: readonly string[]): RawRunArguments {
  const words: string[] = [];
  let maxSteps: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--max-steps') {
      maxSteps = argv[i + 1] ?? '';
      i++;
    } else if (arg.startsWith('--max-steps=')) {
      maxSteps = arg.slice('--max-steps='.length);
    } else {
      words.push(arg);
    }
  }

  return maxSteps === undefined
    ? { goal: words.join(' ').trim() }
    : { goal: words.join(' ').trim(), maxSteps };
}

/**
 * Parses and validates the command line. Throws with every constraint
 * violation listed.
 */
export function parseRunCommand(argv: readonly string[]): RunCommandDto {
  const dto = plainToInstance(RunCommandDto, parseRunArguments(argv));
  const errors = validateSync(dto);
  if (errors.length > 0) {
    const details = errors
      .flatMap((error) => Object.values(error.constraints ?? {}))
      .join('; ');
    throw new Error(`Invalid arguments: ${details}`);
  }
  return dto;
}

export const USAGE = 'Usage: deskpilot "<goal>" [--max-steps N]';
