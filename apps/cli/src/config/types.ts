export type LateLoweringMode = "none" | "all" | "instance" | "static";

export type DeclbindConfig = {
  /** Path of the compilation unit JSON dump. */
  unit: string;
  /** Path of a reference index persisted by a previous build. */
  index?: string;
  lateLowering: LateLoweringMode;
  staticFieldLowering: boolean;
  printNamespace: boolean;
  color: boolean;
};
