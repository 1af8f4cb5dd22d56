export { createHttpContentSource } from "./http-content-source.js";
export { interactivePrompts } from "./interactive-prompts.js";
export { createProcessSignalHandler } from "./process-signals.js";
