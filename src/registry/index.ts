export * from "./types";
export * from "./registry";
export * from "./query";
export { generateSummary, describeTopic, listTopics } from "./docgen";
export * from "./validate";
