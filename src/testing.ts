/**
 * Public test utilities — exported from the `"ecs-service-logger/testing"` entry point.
 */
export { MemorySink } from "./testing/memory-sink.js";
