/**
 * Extension of the last path segment, lowercased and with its dot
 * (e.g. "images/Cat.PNG" → ".png"). Dotfiles like ".bashrc" have none.
 */
export function fileExtension(path: string): string {
  const name = path.slice(path.lastIndexOf("/") + 1);
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return "";
  return name.slice(dot).toLowerCase();
}

/**
 * Normalise a user-supplied extension to ".ext" in lowercase.
 */
export function normalizeExtension(ext: string): string {
  return `.${ext.trim().replace(/^\.+/, "").toLowerCase()}`;
}

/** Join a root-relative directory and a name. */
export function joinPath(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

/** Whether `path` lies strictly beneath directory `dir`. */
export function isBeneath(dir: string, path: string): boolean {
  return path.startsWith(`${dir}/`);
}

/** Directory part of a path, "" at the root. */
export function parentPath(path: string): string {
  const slash = path.lastIndexOf("/");
  return slash === -1 ? "" : path.slice(0, slash);
}

/**
 * Plain code-unit ordering, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
