/**
 * Categories resolved from a single variable to a single path
 */
export type HomeDirectoryKind = "data-home" | "config-home" | "cache-home"

export type BaseDirectoryKind = HomeDirectoryKind | "runtime-dir"

/**
 * Categories resolved from a list-separated variable
 */
export type SearchPathKind = "data-dirs" | "config-dirs"

export type DirectoryKind = BaseDirectoryKind | SearchPathKind

/**
 * Every kind, in the order the diagnostic command reports them
 */
export const ALL_DIRECTORY_KINDS: readonly DirectoryKind[] = [
  "data-home",
  "config-home",
  "cache-home",
  "runtime-dir",
  "data-dirs",
  "config-dirs",
]

export const VARIABLE_NAMES: Readonly<Record<DirectoryKind, string>> = {
  "data-home": "XDG_DATA_HOME",
  "config-home": "XDG_CONFIG_HOME",
  "cache-home": "XDG_CACHE_HOME",
  "runtime-dir": "XDG_RUNTIME_DIR",
  "data-dirs": "XDG_DATA_DIRS",
  "config-dirs": "XDG_CONFIG_DIRS",
}

/**
 * Default locations relative to the user's home directory, as path segments
 */
export const HOME_DEFAULTS: Readonly<
  Record<HomeDirectoryKind, readonly string[]>
> = {
  "data-home": [".local", "share"],
  "config-home": [".config"],
  "cache-home": [".cache"],
}

export const SEARCH_PATH_DEFAULTS: Readonly<
  Record<SearchPathKind, readonly string[]>
> = {
  "data-dirs": ["/usr/local/share", "/usr/share"],
  "config-dirs": ["/etc/xdg"],
}

export const XdgVariable = {
  isDirectoryKind: (value: string): value is DirectoryKind =>
    ALL_DIRECTORY_KINDS.some((kind) => kind === value),
}
