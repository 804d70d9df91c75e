import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { ProjectError } from '../errors.js';
import { logDebug } from '../dx/logger.js';

// Slash-separated; joined onto the root with path.join.
export const BUILD_DOCKERFILE = 'build/Dockerfile';
export const MANAGER_DIR = 'cmd/manager';
export const BUILD_BIN_DIR = 'build/_output/bin';

export interface ProjectInspector {
  /** Throws {@link ProjectError} unless the working directory is a project root. */
  mustInProjectRoot(): void;
  /** True when the project ships a Go manager that has to be compiled. */
  isGoProject(): boolean;
  projectRoot(): string;
  /** Go module path of the project, e.g. `example.com/app-operator`. */
  goPackage(): string;
}

const moduleRe = /^\s*module\s+("?)([^\s"]+)\1\s*(?:\/\/.*)?$/m;

export function parseGoModulePath(goMod: string): string | undefined {
  return moduleRe.exec(goMod)?.[2];
}

export function createProjectInspector(cwd: string = process.cwd()): ProjectInspector {
  const root = resolve(cwd);

  return {
    mustInProjectRoot() {
      const dockerfile = join(root, BUILD_DOCKERFILE);
      if (!existsSync(dockerfile)) {
        throw new ProjectError(
          `must run command in project root dir: project structure requires ${BUILD_DOCKERFILE} (looked in ${root})`,
        );
      }
    },

    isGoProject() {
      const main = join(root, MANAGER_DIR, 'main.go');
      const found = existsSync(main);
      logDebug('go project check', { main, found });
      return found;
    },

    projectRoot() {
      return root;
    },

    goPackage() {
      const goMod = join(root, 'go.mod');
      if (!existsSync(goMod)) {
        throw new ProjectError(`could not determine Go module path: ${goMod} not found`);
      }
      const modulePath = parseGoModulePath(readFileSync(goMod, 'utf8'));
      if (!modulePath) {
        throw new ProjectError(`could not determine Go module path: no module directive in ${goMod}`);
      }
      return modulePath;
    },
  };
}
