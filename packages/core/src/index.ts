/**
 * @benchdef/core
 *
 * Shared framework definition types and constants.
 */

export {
  DEFAULT_DOCKER_AUTHOR,
  type DockerImage,
  type FrameworkDefinition,
  type FrameworkParams,
  TEMPLATE_NAME_PREFIX,
} from "./framework-types.js";
export { isPlainRecord, isTemplateName } from "./type-guards.js";

export const PACKAGE_NAME = "@benchdef/core" as const;
