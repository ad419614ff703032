import type { DockerImage, FrameworkDefinition } from "@benchdef/core";

/**
 * Container image reference for a framework, `author/image:tag`.
 */
export function dockerImageReference(source: FrameworkDefinition | DockerImage): string {
  const image = "dockerImage" in source ? source.dockerImage : source;
  return `${image.author}/${image.image}:${image.tag}`;
}
