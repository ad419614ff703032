/**
 * Zod schemas for raw framework entries, exactly as they appear in the
 * document (snake_case keys, `null` for keys left without a value).
 *
 * Entries are strict: a key outside this schema is a malformed entry.
 */

import { z } from "zod";

/**
 * Versions and tags are free-form strings. An unquoted YAML number
 * (`version: 2.6`) is accepted and converted to its string form.
 */
const VersionLikeSchema = z.union([z.string(), z.number().transform((n) => String(n))]);

export const DockerImageEntrySchema = z
  .object({
    author: z.string().nullish(),
    image: z.string().nullish(),
    tag: VersionLikeSchema.nullish(),
  })
  .strict();

export const FrameworkParamsSchema = z.record(z.unknown());

export const FrameworkEntrySchema = z
  .object({
    extends: z.string().min(1).nullish(),
    version: VersionLikeSchema.nullish(),
    module: z.string().nullish(),
    setup_args: z.string().nullish(),
    setup_cmd: z.string().nullish(),
    params: FrameworkParamsSchema.nullish(),
    project: z.string().nullish(),
    docker_image: DockerImageEntrySchema.nullish(),
  })
  .strict();

export type DockerImageEntry = z.infer<typeof DockerImageEntrySchema>;
export type FrameworkEntry = z.infer<typeof FrameworkEntrySchema>;
