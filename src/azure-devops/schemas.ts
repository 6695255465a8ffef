import { z } from 'zod';

/** `process.type` of a designer (classic) pipeline */
export const CLASSIC_PROCESS_TYPE = 1;
/** `process.type` of a YAML pipeline */
export const YAML_PROCESS_TYPE = 2;

export const buildStepSchema = z.object({
  displayName: z.string().default(''),
  enabled: z.boolean().nullish(),
  task: z
    .object({
      id: z.string().default(''),
      definitionType: z.string().default(''),
    })
    .nullish(),
});

export type BuildStep = z.infer<typeof buildStepSchema>;

export const buildPhaseSchema = z.object({
  name: z.string().optional(),
  steps: z.array(buildStepSchema).nullish(),
});

/**
 * Subset of a build definition read by the inspector
 */
export const buildDefinitionSchema = z.object({
  id: z.number().int(),
  name: z.string().default(''),
  triggers: z
    .array(z.object({ triggerType: z.string() }).passthrough())
    .nullish()
    .transform((triggers) => triggers ?? []),
  process: z
    .object({
      type: z.number().int(),
      yamlFilename: z.string().optional(),
      phases: z.array(buildPhaseSchema).nullish(),
    })
    .nullish(),
  repository: z
    .object({
      type: z.string().optional(),
      defaultBranch: z.string().optional(),
      properties: z
        .object({
          fullName: z.string().optional(),
        })
        .passthrough()
        .nullish(),
    })
    .nullish(),
});

export type BuildDefinition = z.infer<typeof buildDefinitionSchema>;
