/**
 * Everything a run needs from its host. Stage scripts see `env` and nothing
 * else; compiler flags reach them only through `optflags`.
 */
export interface BuildConfig {
  readonly optflags: string;
  readonly workDir: string;
  readonly sourcesDir: string;
  readonly buildDir: string;
  readonly buildRoot: string;
  readonly env: Readonly<Record<string, string>>;
  readonly runCheck: boolean;
  readonly keepBuildRoot: boolean;
  readonly macros: Readonly<Record<string, string>>;
}

export interface ConfigFile {
  readonly optflags?: string;
  readonly work_dir?: string;
  readonly sources_dir?: string;
  readonly build_dir?: string;
  readonly build_root?: string;
  readonly run_check?: boolean;
  readonly keep_build_root?: boolean;
  readonly macros?: Readonly<Record<string, string>>;
  readonly env?: Readonly<Record<string, string>>;
}

export interface ConfigOverrides {
  readonly optflags?: string;
  readonly workDir?: string;
  readonly sourcesDir?: string;
  readonly buildDir?: string;
  readonly buildRoot?: string;
  readonly runCheck?: boolean;
  readonly keepBuildRoot?: boolean;
}
