// src/services/step.table.ts
import * as fs from 'fs-extra';
import { z } from 'zod';

import { RunnerConfig } from '../config/runner.config';
import { errorMessage } from './runner.errors';
import { StepDefinition } from './runner.types';

export const STEP_TABLE = Symbol('STEP_TABLE');

const stepSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9._-]+$/, 'only letters, digits, ".", "_" and "-"'),
  command: z.object({
    program: z.string().min(1),
    args: z.array(z.string()).default([]),
  }),
  failurePolicy: z.enum(['Abort', 'ContinueOnFailure']).default('Abort'),
});

const pipelineSchema = z
  .array(stepSchema)
  .min(1, 'a pipeline needs at least one step')
  .superRefine((steps, ctx) => {
    const seen = new Set<string>();
    steps.forEach((step, index) => {
      if (seen.has(step.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'name'],
          message: `duplicate step name "${step.name}"`,
        });
      }
      seen.add(step.name);
    });
  });

export class StepTableError extends Error {
  constructor(source: string, detail: string) {
    super(`Invalid pipeline in ${source}: ${detail}`);
    this.name = 'StepTableError';
  }
}

/** Validates and freezes a step table. */
export function defineStepTable(input: unknown, source = 'pipeline'): readonly StepDefinition[] {
  const parsed = pipelineSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new StepTableError(source, detail);
  }

  return Object.freeze(
    parsed.data.map((step) =>
      Object.freeze({
        name: step.name,
        command: Object.freeze({ program: step.command.program, args: [...step.command.args] }),
        failurePolicy: step.failurePolicy,
      }),
    ),
  );
}

/** mesh generation, a diagnostic mesh check that may fail, then the solver */
export function defaultStepTable(solver: string): readonly StepDefinition[] {
  return defineStepTable([
    { name: 'mesh-generate', command: { program: 'blockMesh' } },
    { name: 'mesh-check', command: { program: 'checkMesh' }, failurePolicy: 'ContinueOnFailure' },
    { name: 'solve', command: { program: solver } },
  ], 'default pipeline');
}

export async function loadStepTable(config: RunnerConfig): Promise<readonly StepDefinition[]> {
  if (!config.pipelineFile) return defaultStepTable(config.solver);

  let raw: unknown;
  try {
    raw = await fs.readJSON(config.pipelineFile);
  } catch (err) {
    throw new StepTableError(config.pipelineFile, errorMessage(err));
  }
  return defineStepTable(raw, config.pipelineFile);
}
