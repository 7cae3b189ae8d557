/**
 * Test utilities index
 */

export * from "./fixtures/instances";
export * from "./helpers";
export * from "./mocks/network";
export * from "./mocks/notifier";
