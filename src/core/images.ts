import type { ImageConfig } from '../types/config.js';
import type { ConsoleContext } from './context.js';
import { describeOutcome } from './command-runner.js';

export interface BuildPushSummary {
  built: string[];
  pushed: string[];
  buildFailed: string[];
  pushFailed: string[];
  /** services whose name gives no usable or no unique tag */
  skipped: string[];
}

// docker tags: [A-Za-z0-9_][A-Za-z0-9_.-]{0,127}
const MAX_TAG_LENGTH = 128;

/**
 * Docker tag text: whitespace runs become '_', anything outside [A-Za-z0-9_.-] becomes '_',
 * a leading '.' or '-' becomes '_', and the result is cut to 128 characters.
 * Null when nothing is left.
 */
export function sanitizeServiceName(service: string): string | null {
  const tag = service
    .trim()
    .replace(/\s+/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '_')
    .replace(/^[.-]/, '_')
    .slice(0, MAX_TAG_LENGTH);
  return tag === '' ? null : tag;
}

export function imageTag(image: ImageConfig, service: string): string | null {
  const name = sanitizeServiceName(service);
  return name === null ? null : `${image.namespace}/${image.repository}:${name}`;
}

export function buildCommand(
  tag: string,
  dockerfile: string,
  buildArgs: Record<string, string>,
): string[] {
  const args = Object.entries(buildArgs).flatMap(([key, value]) => ['--build-arg', `${key}=${value}`]);
  return ['docker', 'build', ...args, '-t', tag, '-f', dockerfile, '.'];
}

/**
 * Builds and pushes one image per configured service.
 * A failed build skips that service's push; neither kind of failure stops the rest.
 */
export async function buildAndPushImages(ctx: ConsoleContext): Promise<BuildPushSummary> {
  const { logger, runner, config } = ctx;
  const summary: BuildPushSummary = { built: [], pushed: [], buildFailed: [], pushFailed: [], skipped: [] };

  const services = Object.entries(config.services);
  if (services.length === 0) {
    logger.warn('No services configured for build & push.');
    return summary;
  }

  logger.info('Building and pushing Docker images...');
  const owners = new Map<string, string>();
  for (const [service, dockerfile] of services) {
    const tag = imageTag(config.image, service);
    if (tag === null) {
      logger.warn(`Service name '${service}' leaves no valid image tag. Skipping.`);
      summary.skipped.push(service);
      continue;
    }
    const owner = owners.get(tag);
    if (owner !== undefined) {
      logger.warn(`Service '${service}' maps to ${tag}, already used by '${owner}'. Skipping.`);
      summary.skipped.push(service);
      continue;
    }
    owners.set(tag, service);
    if (sanitizeServiceName(service) !== service) {
      logger.warn(`Service '${service}' is tagged as ${tag}.`);
    }
    logger.info(`Building image for service: ${service} (${dockerfile})`);

    const build = await runner.run(buildCommand(tag, dockerfile, config.buildArgs));
    if (build.status === 'failure') {
      logger.error(`Failed to build ${service} image (${describeOutcome(build)}). Skipping push.`);
      summary.buildFailed.push(service);
      continue;
    }
    summary.built.push(service);
    logger.info(`Successfully built ${service} image.`);

    const push = await runner.run(['docker', 'push', tag]);
    if (push.status === 'failure') {
      logger.error(`Failed to push ${tag} (${describeOutcome(push)}).`);
      summary.pushFailed.push(service);
      continue;
    }
    summary.pushed.push(service);
    logger.info(`Successfully pushed ${tag}.`);
  }

  logger.info(
    `Build & push finished: ${summary.built.length} built, ${summary.pushed.length} pushed, ` +
      `${summary.buildFailed.length + summary.pushFailed.length} failed, ${summary.skipped.length} skipped.`,
  );
  return summary;
}
