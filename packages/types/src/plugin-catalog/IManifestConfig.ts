/**
 * Declared input of a plugin manifest.
 */
export interface IPluginInput {
    type?: string;
    description?: string;
    default?: unknown;
    required?: boolean;
    secret?: boolean;
    enum?: string[];
}

/**
 * Spec body of a step plugin manifest.
 */
export interface IPluginStepSpec {
    description: string;
    inputs?: Record<string, IPluginInput>;
    outputs?: string[];
    image?: string;
    entrypoint?: string;
    args?: string[];
    run?: string;
    shell?: string;
    envs?: Record<string, string>;
}

/**
 * Spec body of a stage plugin manifest.
 */
export interface IPluginStageSpec {
    description: string;
    inputs?: Record<string, IPluginInput>;
    steps?: unknown[];
}

interface IManifestEnvelope {
    /**
     * Schema version declared by the manifest (`version: 1`), normalized to a string.
     */
    version?: string;

    /**
     * Declared manifest name, used as the catalog identifier for plugin variants.
     */
    name: string;
}

export interface IStepPluginManifest extends IManifestEnvelope {
    variant: 'step-plugin';
    kind: 'plugin';
    type: 'step';
    spec: IPluginStepSpec;
}

export interface IStagePluginManifest extends IManifestEnvelope {
    variant: 'stage-plugin';
    kind: 'plugin';
    type: 'stage';
    spec: IPluginStageSpec;
}

/**
 * A structurally valid manifest of a kind/type combination the catalog does not store
 * (pipelines, templates, plugin types other than step and stage).
 */
export interface IUnrecognizedManifest extends IManifestEnvelope {
    variant: 'unrecognized';
    kind: string;
    type: string;
    spec?: unknown;
}

/**
 * Parsed form of a manifest document, discriminated by `variant`.
 *
 * Consumers switch exhaustively on `variant`, so adding a variant here surfaces
 * every place that must handle it at compile time.
 */
export type ManifestConfig = IStepPluginManifest | IStagePluginManifest | IUnrecognizedManifest;
