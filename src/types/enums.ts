export enum PromptType {
  Input = "input",
  Confirm = "confirm",
  Select = "select",
}

export type VersionPolicy = "latestOnly" | "allQualifying";

export type WorkerState =
  | "idle"
  | "dequeuing"
  | "expanding-versions"
  | "downloading"
  | "done";
