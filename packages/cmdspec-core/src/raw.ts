import { z } from "zod";

const StringList = z.union([z.string(), z.array(z.string())]).transform(value =>
  Array.isArray(value) ? value : [value]
);

export const RawChoiceSchema = z.union([
  z.string(),
  z.number().transform(value => String(value)),
  z.object({ value: z.union([z.string(), z.number()]).transform(String), help: z.string().optional() }),
]);

export const RawCompleteObjectSchema = z
  .object({
    type: z.enum(["path", "file", "dir", "none"]).optional(),
    extensions: StringList.optional(),
    glob: z.string().optional(),
    run: z.string().optional(),
    timeout: z.number().optional(),
    descriptions: z.boolean().optional(),
    choices: z.array(RawChoiceSchema).optional(),
  })
  .strict();

export const RawCompleteSchema = z.union([z.string(), RawCompleteObjectSchema]);

export const RawFlagArgSchema = z
  .object({
    name: z.string().optional(),
    choices: z.array(RawChoiceSchema).optional(),
    complete: RawCompleteSchema.optional(),
  })
  .strict();

export const RawFlagSchema = z
  .object({
    usage: z.string().optional(),
    name: z.string().optional(),
    short: StringList.optional(),
    long: StringList.optional(),
    negate: z.string().optional(),
    help: z.string().optional(),
    long_help: z.string().optional(),
    global: z.boolean().optional(),
    hide: z.boolean().optional(),
    required: z.boolean().optional(),
    count: z.boolean().optional(),
    var: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).transform(String).optional(),
    env: z.string().optional(),
    arg: RawFlagArgSchema.optional(),
    choices: z.array(RawChoiceSchema).optional(),
    complete: RawCompleteSchema.optional(),
  })
  .strict();

export const RawArgSchema = z
  .object({
    usage: z.string().optional(),
    name: z.string().optional(),
    help: z.string().optional(),
    long_help: z.string().optional(),
    required: z.boolean().optional(),
    var: z.boolean().optional(),
    default: z.union([z.string(), z.number(), z.boolean()]).transform(String).optional(),
    choices: z.array(RawChoiceSchema).optional(),
    complete: RawCompleteSchema.optional(),
  })
  .strict();

export const RawHooksSchema = z
  .object({
    before: z.string().optional(),
    after: z.string().optional(),
  })
  .strict();

type RawCommandInput = {
  name: string;
  aliases?: string | string[];
  help?: string;
  long_help?: string;
  hide?: boolean;
  subcommand_required?: boolean;
  hooks?: z.input<typeof RawHooksSchema>;
  include?: string | string[];
  flags?: z.input<typeof RawFlagSchema>[];
  args?: z.input<typeof RawArgSchema>[];
  commands?: RawCommandInput[];
};

export type RawFlag = z.output<typeof RawFlagSchema>;
export type RawArg = z.output<typeof RawArgSchema>;
export type RawComplete = z.output<typeof RawCompleteSchema>;
export type RawCompleteObject = z.output<typeof RawCompleteObjectSchema>;
export type RawChoice = z.output<typeof RawChoiceSchema>;

export type RawCommand = {
  name: string;
  aliases?: string[];
  help?: string;
  long_help?: string;
  hide?: boolean;
  subcommand_required?: boolean;
  hooks?: z.output<typeof RawHooksSchema>;
  include?: string[];
  flags?: RawFlag[];
  args?: RawArg[];
  commands?: RawCommand[];
};

export const RawCommandSchema: z.ZodType<RawCommand, z.ZodTypeDef, RawCommandInput> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      aliases: StringList.optional(),
      help: z.string().optional(),
      long_help: z.string().optional(),
      hide: z.boolean().optional(),
      subcommand_required: z.boolean().optional(),
      hooks: RawHooksSchema.optional(),
      include: StringList.optional(),
      flags: z.array(RawFlagSchema).optional(),
      args: z.array(RawArgSchema).optional(),
      commands: z.array(RawCommandSchema).optional(),
    })
    .strict()
);

/**
 * One spec document as written on disk. Included documents use the same shape; their scalar
 * fields are ignored when merged into an including node.
 */
export const RawDocumentSchema = z
  .object({
    name: z.string().min(1).optional(),
    bin: z.string().min(1).optional(),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    about: z.string().optional(),
    long_about: z.string().optional(),
    usage: z.string().optional(),
    include: StringList.optional(),
    flags: z.array(RawFlagSchema).optional(),
    args: z.array(RawArgSchema).optional(),
    commands: z.array(RawCommandSchema).optional(),
    complete: z.record(RawCompleteSchema).optional(),
  })
  .strict();

export type RawDocument = z.output<typeof RawDocumentSchema>;

/** The merged tree handed to the model builder: includes are already resolved. */
export type RawSpec = {
  name: string;
  bin?: string;
  version?: string;
  about?: string;
  long_about?: string;
  usage?: string;
  flags: RawFlag[];
  args: RawArg[];
  commands: RawCommand[];
  complete: Record<string, RawComplete>;
};
