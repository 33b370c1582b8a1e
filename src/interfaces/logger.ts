export enum Verbosity {
  Quiet = 0,
  Normal = 1,
  Verbose = 2,
}
