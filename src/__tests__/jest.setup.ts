/**
 * Jest Global Setup
 *
 * Runs before every test file. `reflect-metadata` must be loaded before any
 * class decorated with tsyringe's @injectable/@inject is defined; in
 * production container.ts does this.
 *
 * Logs are silenced unless LOG_LEVEL is set explicitly for a debugging run.
 */
import 'reflect-metadata';

process.env.LOG_LEVEL ??= 'silent';
