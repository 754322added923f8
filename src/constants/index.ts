/**
 * Shared constants for the srcpack CLI application
 * Single source of truth for directory names, file patterns and the
 * engine conventions the collector relies on.
 */

export const DIR_PATTERNS = {
  SRCPACK: '.srcpack',
  MATERIALS: 'materials',
  MODELS: 'models'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  GAMEINFO: 'gameinfo.txt',
  LIBRARY_FOLDERS: 'libraryfolders.vdf',
  VMF: '.vmf',
  VMT: '.vmt',
  VTF: '.vtf',
  MDL: '.mdl',
  VPK: '.vpk',
  VPK_DIRECTORY_SUFFIX: '_dir.vpk'
} as const;

/**
 * Files that make up a compiled model. Only `.mdl` is required.
 */
export const MODEL_SUFFIXES = {
  REQUIRED: '.mdl',
  OPTIONAL: ['.phy', '.dx90.vtx', '.vvd']
} as const;

/**
 * Material parameters whose value is a texture path (relative to materials/, no extension)
 */
export const MATERIAL_TEXTURE_PARAMETERS: readonly string[] = [
  '$basetexture',
  '$basetexture2',
  '$detail',
  '$detail1',
  '$detail2',
  '$bumpmap',
  '$bumpmap2',
  '$bumpmask',
  '$selfillummask',
  '$selfillumtexture',
  '$ambientoccltexture',
  '$lightmap',
  '$phongexponenttexture',
  '$phongwarptexture',
  '$envmap',
  '$envmapmask',
  '$tintmasktexture',
  '$blendmodulatetexture',
  '$normalmap',
  '$lightwarptexture'
];

/**
 * Material parameters whose value is another material
 */
export const MATERIAL_MATERIAL_PARAMETERS: readonly string[] = [
  '$bottommaterial'
];

/**
 * `$envmap env_cubemap` is replaced by the engine with a built cubemap
 */
export const ENGINE_GENERATED_TEXTURES: readonly string[] = [
  'materials/env_cubemap.vtf'
];

/**
 * Entity classes whose "model" keyvalue names a sprite material, not a model
 */
export const SPRITE_ENTITY_CLASSES: readonly string[] = [
  'env_sprite',
  'env_sprite_oriented',
  'env_glow'
];

export const GAME_DEFAULTS = {
  /** Garry's Mod */
  APP_ID: 4000,
  MOD_DIR: 'garrysmod'
} as const;

/**
 * Files read or copied at once within a wave or the copy stage.
 */
export const IO_CONCURRENCY = 16;

export const ENV_VARS = {
  GAME_DIR: 'SRCPACK_GAME_DIR',
  VERBOSE: 'SRCPACK_VERBOSE'
} as const;
