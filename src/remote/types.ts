/**
 * RemoteSource — the narrow interface the export pipeline consumes.
 *
 * Implementations own transport and credentials. They report failures as
 * NotFoundError, PermissionDeniedError or TransientError and hand back
 * vector documents already normalized to the schema in model/vector-document.
 */

import type { VectorDocument } from '../model/vector-document.js';

/** Sentinel container ID for the top of the remote hierarchy. */
export const ROOT_CONTAINER = 'root';

export interface RemoteEntry {
  id: string;
  /** Display name, already sanitized for use as a path segment */
  name?: string;
}

export interface ContainerListing {
  presentations: RemoteEntry[];
  containers: RemoteEntry[];
}

export interface PresentationDescription {
  id: string;
  name: string;
  /** Slide IDs in presentation order */
  slideIds: string[];
  /** Raw remote metadata, dumped by the json format */
  metadata: Record<string, unknown>;
}

export interface RemoteSource {
  listContainer(containerId: string, signal?: AbortSignal): Promise<ContainerListing>;
  describePresentation(presentationId: string, signal?: AbortSignal): Promise<PresentationDescription>;
  fetchSlideVector(presentationId: string, slideId: string, signal?: AbortSignal): Promise<VectorDocument>;
}
