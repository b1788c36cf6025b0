/**
 * Presentation resolver — builds frozen Presentation values, either from a
 * remote description (every slide, in document order) or from an explicit,
 * hand-assembled slide list.
 */

import type { Presentation, SlideRef } from '../model/types.js';
import type { RemoteSource } from '../remote/types.js';

export interface ExplicitPresentationInit {
  id: string;
  name?: string;
  parentPath?: readonly string[];
  slides: readonly SlideRef[];
}

/** Deep-freeze a presentation so no stage of the pipeline can reorder or edit it. */
export function freezePresentation(presentation: Presentation): Presentation {
  return Object.freeze({
    ...presentation,
    parentPath: Object.freeze([...presentation.parentPath]),
    slides: Object.freeze(presentation.slides.map((s) => Object.freeze({ ...s }))),
    metadata: presentation.metadata ? Object.freeze({ ...presentation.metadata }) : undefined,
  });
}

/**
 * Build an explicit ("batch") presentation. Slide refs may point into
 * several remote presentations; their order is kept as given.
 */
export function explicitPresentation(init: ExplicitPresentationInit): Presentation {
  return freezePresentation({
    id: init.id,
    name: init.name,
    parentPath: init.parentPath ?? [],
    source: 'explicit',
    slides: init.slides,
  });
}

export class PresentationResolver {
  constructor(private readonly remote: RemoteSource) {}

  /**
   * Describe a remote presentation and build its sourced Presentation.
   */
  async fromRemote(
    presentationId: string,
    parentPath: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<Presentation> {
    const description = await this.remote.describePresentation(presentationId, signal);
    return freezePresentation({
      id: presentationId,
      name: description.name,
      parentPath,
      source: 'sourced',
      slides: description.slideIds.map((slideId) => ({ presentationId, slideId })),
      metadata: description.metadata,
    });
  }
}
