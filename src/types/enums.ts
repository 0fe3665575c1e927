export enum PromptType {
  Input = "input",
  Confirm = "confirm",
  Select = "select",
}

export enum StrategyName {
  Download = "download",
  Screenshots = "screenshots",
  Text = "text",
}

/**
 * Orchestrator lifecycle. No state is revisited within a run.
 */
export enum AcquisitionState {
  Init = "init",
  NavigatingToDocument = "navigating",
  StrategyA = "strategy-download",
  StrategyB = "strategy-screenshots",
  StrategyC = "strategy-text",
  TearDown = "teardown",
  Done = "done",
}
