export type FormatTag =
  | 'portainer'
  | 'portainer_single'
  | 'portainer_array'
  | 'docker_compose'
  | 'qnap_single'
  | 'qnap_array'
  | 'unknown';

export type RestartPolicy = 'unless-stopped' | 'always' | 'no' | 'on-failure';

export interface TemplateEnvVar {
  name: string;
  /** Canonical key for the default value. `value` is accepted on read only. */
  default?: string;
  label?: string;
  description?: string;
  // Portainer extras such as `select` and `preset` are kept as-is.
  [extra: string]: unknown;
}

/** A single `{label: "80/tcp"}` pair. */
export type TemplatePort = Record<string, string>;

export interface TemplateVolume {
  container: string;
  /** Host path or named volume. Portainer allows it to be omitted. */
  bind?: string;
  readonly?: boolean;
  [extra: string]: unknown;
}

export interface TemplateRepository {
  url?: string;
  stackfile?: string;
  [extra: string]: unknown;
}

export interface CanonicalTemplate {
  title: string;
  description?: string;
  image?: string;
  logo?: string;
  platform?: string;
  restart_policy?: string;
  categories?: string[];
  env?: TemplateEnvVar[];
  ports?: TemplatePort[];
  volumes?: TemplateVolume[];
  note?: string;
  administrator_only?: boolean;
  repository?: TemplateRepository;
  /** Origin of the record while it moves through the merge. Never persisted. */
  _source?: string;
  // Fields outside the canonical set (Portainer `type`, `labels`, `hostname`...) ride along untouched.
  [extra: string]: unknown;
}

export type TaggedTemplate = CanonicalTemplate & { _source: string };

export interface TemplateCollection {
  version: '2';
  templates: CanonicalTemplate[];
}

export interface MergeResult {
  final: TemplateCollection;
  originalCount: number;
  finalCount: number;
  duplicatesRemoved: number;
}

export type FetchErrorKind = 'network' | 'timeout' | 'decode' | 'io';

export type SourceOutcome =
  | {
      sourceId: string;
      ok: true;
      format: FormatTag;
      collection: TemplateCollection;
    }
  | {
      sourceId: string;
      ok: false;
      format?: FormatTag;
      error: { kind: FetchErrorKind | 'detection' | 'conversion'; message: string };
    };

export interface SourceSummary {
  lines: string[];
  sourceCount: number;
  templateCount: number;
}

export type StageName = 'fetch' | 'convert' | 'merge';

export type StageStatus = 'start' | 'progress' | 'success' | 'failure';

export interface StageEvent<T = unknown> {
  runId: string;
  stage: StageName;
  status: StageStatus;
  message?: string;
  data?: T;
  ts: string;
}
