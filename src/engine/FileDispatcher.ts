/**
 * File Dispatcher
 *
 * Runs the scheduled detectors over the files of one project, in a fixed
 * order: manifest, resources, sources, compiled classes, then the shrinker
 * configuration. The abort signal is checked after every unit of work, and
 * a canceled run returns without visiting anything further.
 */

import { basename, dirname, join } from "node:path";
import { ClassContext, Context, JavaContext, XmlContext } from "../context/Context.js";
import {
  isClassScanner,
  isJavaScanner,
  isXmlScanner,
  type ClassDetector,
  type XmlDetector,
} from "../detectors/IDetector.js";
import type { Project } from "../project/Project.js";
import { getFolderType, type ResourceFolderType } from "../resources/ResourceFolderType.js";
import { Scope } from "../scope/Scope.js";
import { isSuppressedInBytecode } from "../suppression/suppression.js";
import type { ClassReader, DomParser } from "../types/parsers.js";
import { tryCatchSync } from "../types/result.js";
import { readArchiveEntries } from "../utils/archive.js";
import { DOT_CLASS, DOT_JAR, DOT_JAVA, PROGUARD_CFG, RES_FOLDER } from "../utils/constants.js";
import {
  exists,
  gatherFiles,
  isDirectory,
  isFile,
  isXmlFile,
  listFiles,
  readBytes,
} from "../utils/fileUtils.js";
import { JavaVisitor } from "../visitors/JavaVisitor.js";
import { XmlVisitor } from "../visitors/XmlVisitor.js";
import type { DetectorScheduler } from "./DetectorScheduler.js";
import { EventType, type EventNotifier } from "./events.js";
import type { LintEngine } from "./LintEngine.js";

// ============================================================================
// Types
// ============================================================================

/**
 * The last resource visitor built. A visitor is reused while the folder
 * type and the detector list stay the same, and also when a new folder
 * type selects exactly the same detectors.
 */
interface VisitorMemo {
  folderType: ResourceFolderType;
  /** The merged resource detectors the memo was computed from */
  checks: readonly XmlDetector[];
  /** Detectors that apply to `folderType` */
  detectors: readonly XmlDetector[];
  visitor: XmlVisitor | null;
}

function sameDetectors(a: readonly XmlDetector[], b: readonly XmlDetector[]): boolean {
  return a.length === b.length && a.every((detector, i) => detector === b[i]);
}

// ============================================================================
// Dispatcher Class
// ============================================================================

export class FileDispatcher {
  private memo: VisitorMemo | null = null;

  constructor(
    private readonly engine: LintEngine,
    private readonly scheduler: DetectorScheduler,
    private readonly notifier: EventNotifier,
    private readonly signal: AbortSignal
  ) {}

  private get canceled(): boolean {
    return this.signal.aborted;
  }

  /**
   * Forget the memoized resource visitor. Called whenever the scheduled
   * detectors are recomputed.
   */
  resetVisitorCache(): void {
    this.memo = null;
  }

  /**
   * Visit the files of `project` on behalf of `main`, which is `project`
   * itself unless a library is being checked.
   */
  runFileDetectors(project: Project, main: Project): void {
    this.checkManifest(project, main);
    if (this.canceled) {
      return;
    }

    this.checkResources(project, main);
    if (this.canceled) {
      return;
    }

    this.checkSources(project, main);
    if (this.canceled) {
      return;
    }

    this.checkClasses(project, main);
    if (this.canceled) {
      return;
    }

    this.checkProguard(project, main);
  }

  // -------------------------------------------------------------------------
  // Manifest
  // -------------------------------------------------------------------------

  private checkManifest(project: Project, main: Project): void {
    const manifestFile = project.manifestFile;
    if (project.isLibrary || manifestFile === null) {
      return;
    }

    const parser = this.engine.client.getDomParser();
    if (parser === null) {
      this.engine.client.log(null, "No XML parser provided to lint: not reading the manifest");
      return;
    }

    const context = new XmlContext(this.engine, project, main, manifestFile, null);
    context.document = parser.parseXml(context);
    if (context.document === null) {
      return;
    }
    project.readManifest(context.document);

    if (!this.engine.getScope().contains(Scope.MANIFEST)) {
      return;
    }

    const detectors = this.scheduler.getDetectors(Scope.MANIFEST).filter(isXmlScanner);
    if (detectors.length > 0) {
      const visitor = new XmlVisitor(parser, detectors);
      this.notifier.fire(EventType.SCANNING_FILE, context);
      visitor.visitFile(context);
    }
  }

  // -------------------------------------------------------------------------
  // Resources
  // -------------------------------------------------------------------------

  private checkResources(project: Project, main: Project): void {
    const scope = this.engine.getScope();
    if (!scope.contains(Scope.RESOURCE_FILE) && !scope.contains(Scope.ALL_RESOURCE_FILES)) {
      return;
    }

    const checks = this.scheduler
      .mergeDetectors(Scope.RESOURCE_FILE, Scope.ALL_RESOURCE_FILES)
      .filter(isXmlScanner);
    if (checks.length === 0) {
      return;
    }

    const parser = this.engine.client.getDomParser();
    if (parser === null) {
      this.engine.client.log(null, "No XML parser provided to lint: not running resource checks");
      return;
    }

    const subset = project.subset;
    if (subset !== null) {
      this.checkIndividualResources(project, main, parser, checks, subset);
      return;
    }

    for (const res of project.resourceFolders) {
      this.checkResFolder(project, main, parser, res, checks);
      if (this.canceled) {
        return;
      }
    }
  }

  private checkIndividualResources(
    project: Project,
    main: Project,
    parser: DomParser,
    checks: readonly XmlDetector[],
    files: readonly string[]
  ): void {
    for (const file of files) {
      if (isDirectory(file)) {
        const type = getFolderType(basename(file));
        if (type !== null && basename(dirname(file)) === RES_FOLDER) {
          this.checkResourceFolder(project, main, parser, file, type, checks);
        } else if (basename(file) === RES_FOLDER) {
          this.checkResFolder(project, main, parser, file, checks);
        } else {
          this.engine.client.log(
            null,
            `Unexpected folder ${file}; should be project, "res" folder or resource folder`
          );
        }
      } else if (isFile(file) && isXmlFile(file)) {
        const type = getFolderType(basename(dirname(file)));
        const visitor = type === null ? null : this.getVisitor(parser, type, checks);
        if (type !== null && visitor !== null) {
          const context = new XmlContext(this.engine, project, main, file, type);
          this.notifier.fire(EventType.SCANNING_FILE, context);
          visitor.visitFile(context);
        }
      }

      if (this.canceled) {
        return;
      }
    }
  }

  private checkResFolder(
    project: Project,
    main: Project,
    parser: DomParser,
    res: string,
    checks: readonly XmlDetector[]
  ): void {
    // Sorted, so that folders of one type (values, values-en, ...) are adjacent
    for (const dir of listFiles(res)) {
      const type = isDirectory(dir) ? getFolderType(basename(dir)) : null;
      if (type !== null) {
        this.checkResourceFolder(project, main, parser, dir, type, checks);
      }

      if (this.canceled) {
        return;
      }
    }
  }

  private checkResourceFolder(
    project: Project,
    main: Project,
    parser: DomParser,
    dir: string,
    type: ResourceFolderType,
    checks: readonly XmlDetector[]
  ): void {
    const files = listFiles(dir).filter((file) => isXmlFile(file) && isFile(file));
    if (files.length === 0) {
      return;
    }

    const visitor = this.getVisitor(parser, type, checks);
    if (visitor === null) {
      return;
    }

    for (const file of files) {
      const context = new XmlContext(this.engine, project, main, file, type);
      this.notifier.fire(EventType.SCANNING_FILE, context);
      visitor.visitFile(context);

      if (this.canceled) {
        return;
      }
    }
  }

  /**
   * The visitor for resource files of `type`, or `null` when no detector
   * applies to that folder type.
   */
  private getVisitor(
    parser: DomParser,
    type: ResourceFolderType,
    checks: readonly XmlDetector[]
  ): XmlVisitor | null {
    const memo = this.memo;
    if (memo !== null && memo.folderType === type && memo.checks === checks) {
      return memo.visitor;
    }

    const applicable = checks.filter((check) => check.appliesToFolder(type));
    if (memo !== null && sameDetectors(memo.detectors, applicable)) {
      this.memo = { ...memo, folderType: type, checks };
      return memo.visitor;
    }

    const visitor = applicable.length === 0 ? null : new XmlVisitor(parser, applicable);
    this.memo = { folderType: type, checks, detectors: applicable, visitor };
    return visitor;
  }

  // -------------------------------------------------------------------------
  // Sources
  // -------------------------------------------------------------------------

  private checkSources(project: Project, main: Project): void {
    const scope = this.engine.getScope();
    if (!scope.contains(Scope.JAVA_FILE) && !scope.contains(Scope.ALL_JAVA_FILES)) {
      return;
    }

    const checks = this.scheduler.mergeDetectors(Scope.JAVA_FILE, Scope.ALL_JAVA_FILES).filter(
      isJavaScanner
    );
    if (checks.length === 0) {
      return;
    }

    const parser = this.engine.client.getJavaParser();
    if (parser === null) {
      this.engine.client.log(null, "No java parser provided to lint: not running Java checks");
      return;
    }

    // Gather everything first so one visitor serves all source folders
    const sources: string[] = [];
    for (const folder of project.javaSourceFolders) {
      gatherFiles(folder, DOT_JAVA, sources);
    }
    if (sources.length === 0) {
      return;
    }

    const visitor = new JavaVisitor(parser, checks);
    for (const file of sources) {
      const context = new JavaContext(this.engine, project, main, file);
      this.notifier.fire(EventType.SCANNING_FILE, context);
      visitor.visitFile(context);

      if (this.canceled) {
        return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Compiled Classes
  // -------------------------------------------------------------------------

  private checkClasses(project: Project, main: Project): void {
    if (!this.engine.getScope().contains(Scope.CLASS_FILE)) {
      return;
    }

    const checks = this.scheduler.getDetectors(Scope.CLASS_FILE).filter(isClassScanner);
    if (checks.length === 0) {
      return;
    }

    const reader = this.engine.client.getClassReader();
    if (reader === null) {
      this.engine.client.log(null, "No class reader provided to lint: not running class checks");
      return;
    }

    for (const entry of project.javaClassFolders) {
      if (entry.endsWith(DOT_JAR)) {
        this.checkJar(project, main, reader, entry, checks);
      } else {
        this.checkClassFolder(project, main, reader, entry, checks);
      }

      if (this.canceled) {
        return;
      }
    }
  }

  private checkJar(
    project: Project,
    main: Project,
    reader: ClassReader,
    jarFile: string,
    checks: readonly ClassDetector[]
  ): void {
    const entries = readArchiveEntries(jarFile);
    if (!entries.ok) {
      this.engine.client.log(null, entries.error.message);
      return;
    }

    for (const entry of entries.value) {
      if (entry.name.endsWith(DOT_CLASS)) {
        const bytes = entry.read();
        if (bytes.ok) {
          this.checkClassFile(project, main, reader, bytes.value, entry.name, jarFile, jarFile, checks);
        } else {
          this.engine.client.log(null, bytes.error.message);
        }
      }

      if (this.canceled) {
        return;
      }
    }
  }

  private checkClassFolder(
    project: Project,
    main: Project,
    reader: ClassReader,
    binDir: string,
    checks: readonly ClassDetector[]
  ): void {
    if (!exists(binDir)) {
      this.engine.client.log(null, `Class folder ${binDir} does not exist`);
      return;
    }

    for (const file of gatherFiles(binDir, DOT_CLASS)) {
      const bytes = readBytes(file);
      if (bytes.ok) {
        this.checkClassFile(project, main, reader, bytes.value, file, null, binDir, checks);
      } else {
        this.engine.client.log(null, bytes.error.message);
      }

      if (this.canceled) {
        return;
      }
    }
  }

  /**
   * @param file - the class file, or the entry name inside `jarFile`
   */
  private checkClassFile(
    project: Project,
    main: Project,
    reader: ClassReader,
    bytes: Buffer,
    file: string,
    jarFile: string | null,
    binDir: string,
    checks: readonly ClassDetector[]
  ): void {
    const parsed = tryCatchSync(() => reader.read(bytes));
    if (!parsed.ok) {
      this.engine.client.log(parsed.error, `Could not read class ${file}`);
      return;
    }
    const classNode = parsed.value;

    // Suppressed for every issue: no context needed
    if (isSuppressedInBytecode(null, classNode)) {
      return;
    }

    const context = new ClassContext(
      this.engine,
      project,
      main,
      file,
      jarFile,
      binDir,
      bytes,
      classNode
    );
    this.notifier.fire(EventType.SCANNING_FILE, context);

    for (const detector of checks) {
      if (detector.appliesTo(context, file)) {
        detector.beforeCheckFile(context);
        detector.checkClass(context, classNode);
        detector.afterCheckFile(context);
      }

      if (this.canceled) {
        return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Shrinker Configuration
  // -------------------------------------------------------------------------

  private checkProguard(project: Project, main: Project): void {
    if (project !== main || !this.engine.getScope().contains(Scope.PROGUARD_FILE)) {
      return;
    }

    const detectors = this.scheduler.getDetectors(Scope.PROGUARD_FILE);
    const file = join(project.dir, PROGUARD_CFG);
    if (detectors.length === 0 || !isFile(file)) {
      return;
    }

    const context = new Context(this.engine, project, main, file);
    this.notifier.fire(EventType.SCANNING_FILE, context);

    for (const detector of detectors) {
      if (detector.appliesTo(context, file)) {
        detector.beforeCheckFile(context);
        detector.run(context);
        detector.afterCheckFile(context);
      }
    }
  }
}
