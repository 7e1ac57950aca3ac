export interface SourceLine {
  /** 1-based line number in the source file. */
  number: number;
  text: string;
}

// ── Compose ─────────────────────────────────────────────────────────────────

export interface Service {
  name: string;
  /** Registry reference, already prefixed with `docker://`. */
  image?: string;
  /** Build context directory. */
  build?: string;
  definitionFile?: string;
  artifactFile?: string;
  command?: string[];
  /** Container path → `host:container` bind specification. */
  volumes: Map<string, string>;
  /** Variable name → pre-quoted value. */
  environment: Map<string, string>;
}

export interface ExtendsReference {
  /** Compose file holding the parent service; undefined means the same file. */
  file?: string;
  service: string;
  line: number;
}

export interface ServiceDeclaration {
  service: Service;
  extends?: ExtendsReference;
  line: number;
}

export interface ComposeDocument {
  path: string;
  declarations: ServiceDeclaration[];
}

export interface ComposeProject {
  path: string;
  services: Service[];
}

// ── Dockerfile / recipe ─────────────────────────────────────────────────────

/** CMD / ENTRYPOINT value, decided once at parse time. */
export type StageCommand =
  | { kind: 'exec'; tokens: string[] }
  | { kind: 'shell'; text: string };

export interface FileCopy {
  source: string;
  destination: string;
}

export interface Label {
  key: string;
  value: string;
}

export interface BuildStage {
  index: number;
  name: string;
  /** True once the stage got its name from an `AS <name>` suffix. */
  named: boolean;
  fromHeader?: string;
  install: string[];
  environment: string[];
  labels: Label[];
  files: FileCopy[];
  /** Source stage name → copies taken from that stage's output. */
  stageFiles: Map<string, FileCopy[]>;
  cmd?: StageCommand;
  entrypoint?: StageCommand;
  test?: string;
  workdir?: string;
  volumes: string[];
  ports: string[];
  stopSignal?: string;
}

export interface Recipe {
  source: string;
  stages: BuildStage[];
}

// ── CLI ─────────────────────────────────────────────────────────────────────

export interface CliOptions {
  file?: string;
  binary?: string;
  dryRun?: boolean;
  verbose?: boolean;
  writableTmpfs?: boolean;
}

export interface ResolvedConfig {
  cwd: string;
  composePath: string;
  binary: string;
  dryRun: boolean;
  verbose: boolean;
  writableTmpfs: boolean;
}

export type CommandRequest =
  | { action: 'build' }
  | { action: 'up'; writableTmpfs: boolean }
  | { action: 'run'; writableTmpfs: boolean; args: string[] };
