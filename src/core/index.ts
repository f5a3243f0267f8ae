/**
 * Core module index - exports all core functionality
 */

// Constants
export * from "./constants/index";

// Errors
export * from "./errors";

// Client
export * from "./client/index";

// Pipeline
export * from "./pipeline/index";

// Services
export * from "./services/index";

// Utils
export * from "./utils/index";

// Config
export * from "./config/index";

// Types
export * from "./types/index";

// Validation
export * from "./validation/index";
