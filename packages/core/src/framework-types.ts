/**
 * Framework definition types shared by the resolver and its consumers.
 */

/** Docker hub account used when a definition names no image author */
export const DEFAULT_DOCKER_AUTHOR = "automlbenchmark" as const;

/**
 * Entries whose name starts with this prefix are documentation-only
 * templates: they never appear in a resolved mapping.
 */
export const TEMPLATE_NAME_PREFIX = "__" as const;

/**
 * Hyperparameters handed to the framework adapter.
 * Values are whatever the document holds (scalars, lists, nested mappings).
 */
export type FrameworkParams = Readonly<Record<string, unknown>>;

/**
 * Container image naming for a framework: `author/image:tag`.
 */
export interface DockerImage {
  readonly author: string;
  readonly image: string;
  readonly tag: string;
}

/**
 * Fully-resolved framework definition.
 *
 * Inheritance has been applied and every default filled in;
 * `extends` is not retained.
 */
export interface FrameworkDefinition {
  readonly name: string;
  /** Release of the framework to use (never empty) */
  readonly version: string;
  /** Adapter module invoked for this framework, defaults to `name` */
  readonly module: string;
  /** Arguments for the external setup step, defaults to "" */
  readonly setupArgs: string;
  /** Shell command run after the setup step */
  readonly setupCmd?: string;
  readonly params: FrameworkParams;
  /** Project homepage, informational only */
  readonly project?: string;
  readonly dockerImage: DockerImage;
}
