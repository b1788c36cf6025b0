/**
 * Folder Exporter
 *
 * Resolves a container tree depth-first into presentation targets, then
 * exports them through PresentationExporter with bounded concurrency.
 *
 * - A container that re-enters its own ancestor chain records a
 *   CyclicContainerError for that branch only.
 * - A container reached through a second path is not listed again.
 * - Containers deeper than maxDepth record a DepthLimitError.
 * - Listings are cached for the duration of one exportTree call.
 * - Presentations whose output directory is already taken (same name in
 *   the same folder) are renamed "<name>-<id>", in tree order.
 */

import os from 'os';
import { CancelledError, CyclicContainerError, DepthLimitError, ErrorHandler } from '../errors/index.js';
import type { DeckMediaError } from '../errors/index.js';
import type { ILogger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { ExportOptions, ExportResult, Presentation } from '../model/types.js';
import { ParallelProcessor } from '../performance/parallel-processor.js';
import { DEFAULT_RETRY_POLICY, RetryingRemoteSource } from '../remote/retry.js';
import type { RetryPolicy } from '../remote/retry.js';
import { ROOT_CONTAINER } from '../remote/types.js';
import type { ContainerListing, RemoteSource } from '../remote/types.js';
import { sanitizePathSegment } from './output-layout.js';
import type { PresentationExporter } from './presentation-exporter.js';
import { freezePresentation, PresentationResolver } from './presentation-resolver.js';

export interface FolderOverrides {
  /** Already-built presentations (sourced or explicit) */
  presentations?: readonly Presentation[];
  /** Extra container roots, each exported under a directory named by its ID */
  folderIds?: readonly string[];
  /** Extra presentation roots, exported at the top of the output root */
  presentationIds?: readonly string[];
}

export interface FolderExporterOptions {
  /** Deepest container level resolved below a root (default: 10) */
  maxDepth?: number;
  /** Concurrent presentation exports (default: available parallelism) */
  presentationConcurrency?: number;
  retryPolicy?: RetryPolicy;
  logger?: ILogger;
}

export const DEFAULT_MAX_DEPTH = 10;

type Target =
  | { kind: 'remote'; id: string; parentPath: readonly string[] }
  | { kind: 'built'; presentation: Presentation };

type Planned =
  | { kind: 'ready'; presentation: Presentation }
  | { kind: 'failed'; result: ExportResult };

interface TreeWalk {
  targets: Target[];
  failures: ExportResult[];
  listed: Set<string>;
  targetKeys: Set<string>;
  signal?: AbortSignal;
}

function containerFailure(id: string, parentPath: readonly string[], error: DeckMediaError): ExportResult {
  return {
    subject: { kind: 'container', id, parentPath },
    artifacts: [],
    errors: [{ error }],
    cachedFormats: [],
  };
}

function presentationFailure(target: Target, error: DeckMediaError): ExportResult {
  const subject = target.kind === 'built'
    ? { kind: 'presentation' as const, id: target.presentation.id, name: target.presentation.name, parentPath: target.presentation.parentPath }
    : { kind: 'presentation' as const, id: target.id, parentPath: target.parentPath };
  return { subject, artifacts: [], errors: [{ error }], cachedFormats: [] };
}

export class FolderExporter {
  private readonly remote: RemoteSource;
  private readonly resolver: PresentationResolver;
  private readonly maxDepth: number;
  private readonly concurrency: number;
  private readonly logger: ILogger;

  constructor(
    remote: RemoteSource,
    private readonly exporter: PresentationExporter,
    options: FolderExporterOptions = {}
  ) {
    this.remote = new RetryingRemoteSource(remote, options.retryPolicy ?? DEFAULT_RETRY_POLICY);
    this.resolver = new PresentationResolver(this.remote);
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.concurrency = options.presentationConcurrency ?? os.availableParallelism();
    this.logger = (options.logger ?? silentLogger).child('folder');
  }

  /**
   * Export every presentation reachable from root plus the overrides.
   * Returns one result per presentation and one per failed container.
   * InvalidRequestError for a bad format set or options is thrown before
   * any remote call.
   */
  async exportTree(
    root: string,
    formats: readonly string[],
    options: ExportOptions,
    overrides: FolderOverrides = {},
    signal?: AbortSignal
  ): Promise<ExportResult[]> {
    this.exporter.validate(formats, options);

    const listings = new Map<string, Promise<ContainerListing>>();
    const walk: TreeWalk = { targets: [], failures: [], listed: new Set(), targetKeys: new Set(), signal };

    await this.resolveContainer(root || ROOT_CONTAINER, [], [], 0, walk, listings);
    for (const folderId of overrides.folderIds ?? []) {
      await this.resolveContainer(folderId, [sanitizePathSegment(folderId)], [], 0, walk, listings);
    }
    for (const id of overrides.presentationIds ?? []) {
      this.addTarget(walk, { kind: 'remote', id, parentPath: [] });
    }
    for (const presentation of overrides.presentations ?? []) {
      this.addTarget(walk, { kind: 'built', presentation });
    }

    this.logger.info('Resolved container tree', {
      presentations: walk.targets.length,
      failedContainers: walk.failures.length,
    });

    const described = await new ParallelProcessor(
      (target: Target, _i: number, s?: AbortSignal) => this.describeTarget(target, s),
      { concurrency: this.concurrency }
    ).processAll(walk.targets, signal);
    const planned = this.assignDirectories(described.map(({ input, output, error }): Planned => (
      output
        ? { kind: 'ready', presentation: output }
        : { kind: 'failed', result: presentationFailure(input, error ?? new CancelledError()) }
    )));

    const exported = await new ParallelProcessor(
      (item: Planned, _i: number, s?: AbortSignal) => this.exportPlanned(item, formats, options, s),
      { concurrency: this.concurrency }
    ).processAll(planned, signal);

    const results: ExportResult[] = [...walk.failures];
    for (const { input, output, error } of exported) {
      if (output) {
        results.push(output);
      } else if (input.kind === 'failed') {
        results.push(input.result);
      } else {
        results.push(presentationFailure({ kind: 'built', presentation: input.presentation }, error ?? new CancelledError()));
      }
    }
    return results;
  }

  // ─── Resolution ─────────────────────────────────────────────────────────────

  private async resolveContainer(
    containerId: string,
    parentPath: readonly string[],
    ancestors: readonly string[],
    depth: number,
    walk: TreeWalk,
    listings: Map<string, Promise<ContainerListing>>
  ): Promise<void> {
    const loopStart = ancestors.indexOf(containerId);
    if (loopStart >= 0) {
      const cycle = [...ancestors.slice(loopStart), containerId];
      walk.failures.push(containerFailure(containerId, parentPath,
        new CyclicContainerError(`Container ${containerId} contains itself`, cycle, { containerId })));
      return;
    }
    if (walk.listed.has(containerId)) {
      this.logger.debug('Container already resolved', { containerId });
      return;
    }
    if (depth > this.maxDepth) {
      walk.failures.push(containerFailure(containerId, parentPath,
        new DepthLimitError(`Container ${containerId} is nested deeper than ${this.maxDepth} levels`, { containerId, depth })));
      return;
    }
    if (walk.signal?.aborted) {
      walk.failures.push(containerFailure(containerId, parentPath, new CancelledError()));
      return;
    }

    walk.listed.add(containerId);
    let listing: ContainerListing;
    try {
      listing = await this.list(containerId, listings, walk.signal);
    } catch (err) {
      walk.failures.push(containerFailure(containerId, parentPath, ErrorHandler.normalize(err, { containerId })));
      return;
    }

    for (const entry of listing.presentations) {
      this.addTarget(walk, { kind: 'remote', id: entry.id, parentPath });
    }
    const chain = [...ancestors, containerId];
    for (const child of listing.containers) {
      await this.resolveContainer(
        child.id,
        [...parentPath, child.name ?? sanitizePathSegment(child.id)],
        chain,
        depth + 1,
        walk,
        listings
      );
    }
  }

  private list(
    containerId: string,
    listings: Map<string, Promise<ContainerListing>>,
    signal?: AbortSignal
  ): Promise<ContainerListing> {
    let pending = listings.get(containerId);
    if (!pending) {
      pending = this.remote.listContainer(containerId, signal);
      listings.set(containerId, pending);
    }
    return pending;
  }

  private addTarget(walk: TreeWalk, target: Target): void {
    const id = target.kind === 'built' ? target.presentation.id : target.id;
    const parentPath = target.kind === 'built' ? target.presentation.parentPath : target.parentPath;
    const key = `${target.kind}\u0000${id}\u0000${parentPath.join('/')}`;
    if (walk.targetKeys.has(key)) return;
    walk.targetKeys.add(key);
    walk.targets.push(target);
  }

  // ─── Export ─────────────────────────────────────────────────────────────────

  private async describeTarget(target: Target, signal?: AbortSignal): Promise<Presentation> {
    if (target.kind === 'built') return target.presentation;
    try {
      return await this.resolver.fromRemote(target.id, target.parentPath, signal);
    } catch (err) {
      throw ErrorHandler.normalize(err, { presentationId: target.id });
    }
  }

  /**
   * Give every presentation its own output directory. The first claimant
   * keeps its name; later ones get "<name>-<id>" (then "-2", "-3", ...).
   */
  private assignDirectories(planned: Planned[]): Planned[] {
    const claimed = new Set<string>();
    return planned.map((item) => {
      if (item.kind === 'failed') return item;
      let presentation = item.presentation;
      const base = `${presentation.name ?? presentation.id}-${presentation.id}`;
      for (let n = 1; claimed.has(this.exporter.layout.presentationDir(presentation)); n++) {
        presentation = freezePresentation({ ...item.presentation, name: n === 1 ? base : `${base}-${n}` });
      }
      if (presentation !== item.presentation) {
        this.logger.warn('Output directory already in use; renamed', {
          presentationId: presentation.id,
          name: presentation.name,
        });
      }
      claimed.add(this.exporter.layout.presentationDir(presentation));
      return { kind: 'ready', presentation };
    });
  }

  private async exportPlanned(
    item: Planned,
    formats: readonly string[],
    options: ExportOptions,
    signal?: AbortSignal
  ): Promise<ExportResult> {
    if (item.kind === 'failed') return item.result;
    try {
      return await this.exporter.export(item.presentation, formats, options, signal);
    } catch (err) {
      return presentationFailure({ kind: 'built', presentation: item.presentation }, ErrorHandler.normalize(err));
    }
  }
}
