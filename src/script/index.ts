// src/script/index.ts

export { runScript, describeFailure, type ScriptPolicy, type ScriptOptions, type LineTrace } from "./runner";
