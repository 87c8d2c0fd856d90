import type { ReleaseSettings } from "../types/config.js";
import type { Environment, EnvironmentTarget } from "../types/release.js";

/**
 * Production releases and deploys from the stable branch, staging from the
 * integration branch. The deploy job token comes from config.
 */
export function environmentTarget(environment: Environment, settings: ReleaseSettings): EnvironmentTarget {
  switch (environment) {
    case "production":
      return {
        environment,
        branch: settings.branches.stable,
        deployJob: settings.deploy.jobs.production,
        pipelineRef: settings.branches.stable,
      };
    case "staging":
      return {
        environment,
        branch: settings.branches.integration,
        deployJob: settings.deploy.jobs.staging,
        pipelineRef: settings.branches.integration,
      };
  }
}
