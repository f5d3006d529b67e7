export const UNKNOWN_VERSION = 'unknown';

export interface ProgramInfo {
  version: string;
  node_version: string;
}

/**
 * Static metadata attached to every record under `program_info`.
 * Missing values become "unknown".
 */
export function readProgramInfo(
  env: NodeJS.ProcessEnv = process.env,
  versions: Partial<NodeJS.ProcessVersions> = process.versions,
): ProgramInfo {
  return {
    version: env.npm_package_version || UNKNOWN_VERSION,
    node_version: versions.node || UNKNOWN_VERSION,
  };
}
