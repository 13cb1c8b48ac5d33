/** Raw options as commander hands them to the `develop` action */
export interface DevelopCommandOptions {
  maxIterations?: string;
  sandbox?: string;
  language?: string;
  image?: string;
  output?: string;
  saveMetadata?: boolean;
  /** `--no-save` sets this to false */
  save?: boolean;
  config?: string;
  verbose?: boolean;
}
