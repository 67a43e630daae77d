/**
 * Application Layer
 *
 * Contains use cases that orchestrate the application's business logic.
 * Use cases depend on domain entities and infrastructure ports (not concrete implementations).
 */

export * from "./usecases";
