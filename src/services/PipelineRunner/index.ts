export * from "./PipelineRunner";
export * from "./PipelineRunnerDefault";
export * from "./RunControl";
