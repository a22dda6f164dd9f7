/**
 * Resource folder types, keyed by the folder name without its
 * configuration qualifiers (`values-en-rUS` is a `values` folder).
 */

export enum ResourceFolderType {
  ANIM = "anim",
  ANIMATOR = "animator",
  COLOR = "color",
  DRAWABLE = "drawable",
  INTERPOLATOR = "interpolator",
  LAYOUT = "layout",
  MENU = "menu",
  MIPMAP = "mipmap",
  RAW = "raw",
  VALUES = "values",
  XML = "xml",
}

const FOLDER_TYPES: ReadonlyMap<string, ResourceFolderType> = new Map(
  Object.values(ResourceFolderType).map((type): [string, ResourceFolderType] => [type, type])
);

export function getFolderType(folderName: string): ResourceFolderType | null {
  const dash = folderName.indexOf("-");
  const base = dash === -1 ? folderName : folderName.slice(0, dash);
  return FOLDER_TYPES.get(base) ?? null;
}
