export const PROJECT_NAME = "GeoSnag";
export const VERSION = "0.2.0";

/** Prefix of the Software tag value written after a successful GPS write. */
export const MARKER_PREFIX = `${PROJECT_NAME}:`;

export const INDEX_FILENAME = ".geosnag-index.json";
