import type { Effect } from "effect";
import type { Fetcher } from "../fetcher/types.ts";
import type { Locator, Manifest } from "../manifest.ts";
import type { ReadError, ResourceError } from "../utils/errors.ts";

export interface ServiceContext {
  readonly manifest: Manifest;
  readonly fetcher: Fetcher;
}

export interface PositionsService {
  positions(): Effect.Effect<Locator[], ResourceError>;
}

export interface ContentElement {
  locator: Locator;
  role: "heading" | "body" | "quote" | "listItem";
  text: string;
}

export interface ContentService {
  elements(): Effect.Effect<ContentElement[], ResourceError>;
}

export interface GuidedNavigationObject {
  textref?: string;
  audioref?: string;
}

export interface GuidedNavigationService {
  readonly hasGuidedNavigation: boolean;
  guideForResource(href: string): Effect.Effect<GuidedNavigationObject[] | null, ReadError>;
}

export interface ServiceMap {
  PositionsService: PositionsService;
  ContentService: ContentService;
  GuidedNavigationService: GuidedNavigationService;
}

export type ServiceName = keyof ServiceMap;

export type ServiceFactories = {
  [K in ServiceName]?: (context: ServiceContext) => ServiceMap[K];
};

export type Services = {
  [K in ServiceName]?: ServiceMap[K];
};

export class ServicesBuilder {
  constructor(private readonly factories: ServiceFactories = {}) {}

  build(context: ServiceContext): Services {
    const { PositionsService, ContentService, GuidedNavigationService } = this.factories;
    return {
      PositionsService: PositionsService?.(context),
      ContentService: ContentService?.(context),
      GuidedNavigationService: GuidedNavigationService?.(context),
    };
  }
}
