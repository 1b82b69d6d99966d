/**
 * Configuration types for quire
 */

export interface QuireConfig {
  layout?: LayoutConfig;
  logging?: LoggingConfig;
}

export interface LayoutConfig {
  maxDepth?: number; // Deepest submodel nesting the driver will follow (default 64)
  debug?: boolean; // Set on the layout context by LayoutService.fromConfig
}

export interface LoggingConfig {
  level?: string; // One of the npm levels: error, warn, info, http, verbose, debug, silly
}

export interface ResolvedLayoutConfig {
  maxDepth: number;
  debug: boolean;
}

export interface ResolvedConfig {
  layout: ResolvedLayoutConfig;
  logging: {
    level: string;
  };
}

export const DEFAULT_MAX_DEPTH = 64;
