import type { AllowedFiles } from "../AllowedFiles";

const BINARY_MARKER = /^Binary files .* differ$/;

function diffTargetPath(header: string): string | null {
  let target = header.slice("+++ ".length).trim();
  if (target.startsWith('"') && target.endsWith('"') && target.length >= 2) {
    target = target.slice(1, -1);
  }
  if (target === "/dev/null") return null;
  return target.startsWith("b/") ? target.slice(2) : target;
}

/**
 * Lines added by a unified diff, restricted to allowed code paths.
 * Binary-file sections and deleted files contribute nothing.
 */
export function extractAddedLines(diffText: string, allowedFiles: Pick<AllowedFiles, "isCodePath">): string[] {
  const added: string[] = [];
  let currentFile: string | null = null;
  let binary = false;

  for (const line of diffText.split("\n")) {
    if (line.startsWith("diff --git ")) {
      currentFile = null;
      binary = false;
    } else if (BINARY_MARKER.test(line)) {
      binary = true;
    } else if (line.startsWith("+++ ")) {
      const path = diffTargetPath(line);
      currentFile = path !== null && allowedFiles.isCodePath(path) ? path : null;
    } else if (line.startsWith("+") && !line.startsWith("+++")) {
      if (currentFile !== null && !binary) added.push(line.slice(1));
    }
  }
  return added;
}
