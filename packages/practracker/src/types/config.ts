export interface SourcesConfig {
  include?: string[];
  ignore?: string[];
}

// shape of practracker.yaml; every key is optional
export interface PractrackerConfig {
  exceptions?: string;
  sources?: SourcesConfig;
}

export interface ResolvedConfig {
  topdir: string;
  exceptionsPath: string;
  include: string[];
  ignore: string[];
  // null when no config file was found
  configPath: string | null;
}
