// ---------------------------------------------------------------------------
// Shared domain types for packaging and running a Nextflow project on
// Snowpark Container Services.
// ---------------------------------------------------------------------------

// -- Service specification building blocks ----------------------------------

/** Named volume backed by a stage location (e.g. "@data/inputs"). */
export type Volume = {
  name: string;
  /** Stage location, always prefixed with "@". */
  source: string;
}

/** Mount of a named volume inside a container. */
export type VolumeMount = {
  /** Name of the volume, must match a `Volume.name` of the same spec. */
  name: string;
  mountPath: string;
}

/** Volumes and their mounts, index-aligned by construction. */
export type VolumeConfig = {
  volumes: readonly Volume[];
  volumeMounts: readonly VolumeMount[];
}

export type Container = {
  name: string;
  image: string;
  command: string[];
  volumeMounts: VolumeMount[];
}

/** Network endpoint exposed by the service. */
export type Endpoint = {
  name: string;
  port: number;
  /** When true the endpoint gets an ingress URL reachable from outside the account. */
  public: boolean;
}

/**
 * Declarative service specification, serialized to YAML and submitted verbatim.
 */
export type JobSpecification = {
  spec: {
    containers: Container[];
    volumes: Volume[];
    endpoints: Endpoint[];
  };
}

// -- Project configuration --------------------------------------------------

/**
 * Configuration resolved from `nextflow config -flat`.
 * Parsed once per run, never mutated afterwards.
 */
export type ProjectConfiguration = Readonly<{
  /** Compute pool the service is created in. */
  computePool: string;
  /** Stage holding uploaded projects and the Nextflow work directory. */
  workDirStage: string;
  /** Extra stage mounts declared with `snowflake.stageMounts`. */
  volumeConfig: VolumeConfig;
}>

// -- Run identity -----------------------------------------------------------

/** Returns a uniformly distributed integer in `[0, max)`. */
export type RandomSource = (max: number) => number

/**
 * Identity of one invocation. The token names the Nextflow run, namespaces
 * the uploaded artifacts and suffixes the service name.
 */
export type RunIdentity = Readonly<{
  token: string;
  jobName: string;
  /** Correlation tag attached to every remote operation of the run. */
  tags: Readonly<Record<string, string>>;
}>

/** Project archive once it sits on the stage. */
export type UploadedArtifact = {
  /** Basename of the uploaded archive. */
  fileName: string;
  /** Top-level directory inside the archive. */
  rootDir: string;
}

// -- Outcome ----------------------------------------------------------------

/**
 * Result of a run: the exit code reported by the workflow engine, or
 * `incomplete` when no usable completion signal was observed.
 *
 * `unknown-exit-code`: the run completed with an `exit_code` that is not an
 * integer.
 */
export type RunOutcome =
  | {status: 'exited'; exitCode: number}
  | {status: 'incomplete'; reason: 'closed' | 'cancelled' | 'unknown-exit-code'}
