/**
 * File names, extensions and annotation names the engine recognises.
 */

export const ANDROID_MANIFEST_XML = "AndroidManifest.xml";
export const PROGUARD_CFG = "proguard.cfg";
export const PROJECT_PROPERTIES = "project.properties";

export const RES_FOLDER = "res";
export const SRC_FOLDER = "src";
export const GEN_FOLDER = "gen";
export const BIN_FOLDER = "bin";
export const CLASSES_FOLDER = "classes";
export const LIBS_FOLDER = "libs";

export const DOT_XML = ".xml";
export const DOT_JAVA = ".java";
export const DOT_CLASS = ".class";
export const DOT_JAR = ".jar";

/** Suppression id that matches every issue */
export const SUPPRESS_ALL = "all";
export const SUPPRESS_LINT = "SuppressLint";
export const SUPPRESS_WARNINGS = "SuppressWarnings";
/** Tail of the JVM type descriptor of the suppression annotation */
export const SUPPRESS_LINT_VMSIG = `/${SUPPRESS_LINT};`;
