import { z } from 'zod';

/**
 * Zod schemas for the structural validation of plugin manifests.
 *
 * The manifest format itself is owned elsewhere; these schemas check only the
 * shape the catalog relies on. YAML scalars are accepted wherever a string is
 * expected and an empty value (`null`) reads as absent. Unknown keys are
 * stripped from the parsed form, while the raw manifest text is kept verbatim
 * by the caller.
 */

/**
 * Any YAML scalar, read as its string form.
 */
const ScalarStringSchema = z.union([z.string(), z.number(), z.boolean()]).transform(value => String(value));

/**
 * Scalar string where an empty or missing value reads as `''`.
 */
const TextSchema = ScalarStringSchema.nullish().transform(value => value ?? '');

/**
 * Optional field where an empty value (`key:` with nothing after it) reads as absent.
 */
function optional<T extends z.ZodTypeAny>(schema: T) {
    return schema.nullish().transform(value => value ?? undefined);
}

/**
 * Mapping that may be left empty (`spec:`), read as `{}`.
 */
function mapping<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(value => value ?? {}, schema);
}

const ManifestVersionSchema = optional(ScalarStringSchema);

/**
 * Outer document shared by every manifest kind. `kind` selects the variant;
 * `type` and `name` may be absent on kinds that do not use them.
 */
export const ManifestEnvelopeSchema = z.object({
    version: ManifestVersionSchema,
    kind: z.string().min(1, 'manifest must declare a kind'),
    type: TextSchema,
    name: TextSchema,
    spec: z.unknown()
});

export const PluginInputSchema = mapping(
    z.object({
        type: optional(ScalarStringSchema),
        description: optional(ScalarStringSchema),
        default: z.unknown().optional(),
        required: optional(z.boolean()),
        secret: optional(z.boolean()),
        enum: optional(z.array(ScalarStringSchema))
    })
);

const PluginInputsSchema = optional(z.record(z.string(), PluginInputSchema));

export const PluginStepSpecSchema = z.object({
    description: TextSchema,
    inputs: PluginInputsSchema,
    outputs: optional(z.array(ScalarStringSchema)),
    image: optional(ScalarStringSchema),
    entrypoint: optional(ScalarStringSchema),
    args: optional(z.array(ScalarStringSchema)),
    run: optional(ScalarStringSchema),
    shell: optional(ScalarStringSchema),
    envs: optional(z.record(z.string(), TextSchema))
});

export const PluginStageSpecSchema = z.object({
    description: TextSchema,
    inputs: PluginInputsSchema,
    steps: optional(z.array(z.unknown()))
});

const PluginNameSchema = ScalarStringSchema.pipe(z.string().min(1, 'plugin manifest must declare a name'));

export const StepPluginManifestSchema = z.object({
    version: ManifestVersionSchema,
    kind: z.literal('plugin'),
    type: z.literal('step'),
    name: PluginNameSchema,
    spec: mapping(PluginStepSpecSchema)
});

export const StagePluginManifestSchema = z.object({
    version: ManifestVersionSchema,
    kind: z.literal('plugin'),
    type: z.literal('stage'),
    name: PluginNameSchema,
    spec: mapping(PluginStageSpecSchema)
});
