import { basename, dirname } from "node:path";
import type { Project } from "../project/Project.js";
import {
  ANDROID_MANIFEST_XML,
  DOT_CLASS,
  DOT_JAVA,
  DOT_XML,
  PROGUARD_CFG,
  RES_FOLDER,
} from "../utils/constants.js";
import { Scope, ScopeSet } from "./Scope.js";

/**
 * Work out the scope of a run from the files the user pointed at. Any
 * project checked as a whole (no explicit subset) means everything is in
 * scope.
 */
export function inferScope(projects: Iterable<Project>): ScopeSet {
  const scopes = new Set<Scope>();

  for (const project of projects) {
    const subset = project.subset;
    if (subset === null) {
      return ScopeSet.ALL;
    }

    for (const file of subset) {
      for (const scope of classifyFile(file)) {
        scopes.add(scope);
      }
    }
  }

  return ScopeSet.from(scopes);
}

function classifyFile(file: string): Scope[] {
  const name = basename(file);

  if (name === ANDROID_MANIFEST_XML) {
    return [Scope.MANIFEST];
  } else if (name.endsWith(DOT_XML)) {
    return [Scope.RESOURCE_FILE];
  } else if (name === PROGUARD_CFG) {
    return [Scope.PROGUARD_FILE];
  } else if (name === RES_FOLDER || basename(dirname(file)) === RES_FOLDER) {
    return [Scope.ALL_RESOURCE_FILES, Scope.RESOURCE_FILE];
  } else if (name.endsWith(DOT_JAVA)) {
    return [Scope.JAVA_FILE];
  } else if (name.endsWith(DOT_CLASS)) {
    return [Scope.CLASS_FILE];
  }

  return [];
}
