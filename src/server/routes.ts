import { RequestType } from "./types.js";

type TemplateSegment = { kind: "literal"; value: string } | { kind: "parameter"; name: string };

type RouteTemplate = {
  type: RequestType;
  method: string;
  segments: TemplateSegment[];
};

export type RouteMatch = {
  type: RequestType;
  params: Record<string, string>;
};

function splitPath(pathname: string): string[] {
  return pathname.split("/").filter((part) => part.length > 0);
}

function parseTemplate(template: string): TemplateSegment[] {
  return splitPath(template).map((part): TemplateSegment =>
    part.startsWith("{") && part.endsWith("}")
      ? { kind: "parameter", name: part.slice(1, -1) }
      : { kind: "literal", value: part },
  );
}

function route(type: RequestType, method: string, template: string): RouteTemplate {
  return { type, method, segments: parseTemplate(template) };
}

// Checked in order; the first structural match wins.
const ROUTES: readonly RouteTemplate[] = [
  route(RequestType.GetNextInvocation, "GET", "{version}/runtime/invocation/next"),
  route(RequestType.PostInitError, "POST", "{version}/runtime/init/error"),
  route(RequestType.PostResponse, "POST", "{version}/runtime/invocation/{requestId}/response"),
  route(RequestType.PostError, "POST", "{version}/runtime/invocation/{requestId}/error"),
];

function matchSegments(segments: TemplateSegment[], parts: string[]): Record<string, string> | undefined {
  if (segments.length !== parts.length) {
    return undefined;
  }

  const params: Record<string, string> = {};
  for (const [index, segment] of segments.entries()) {
    const part = parts[index];
    if (part === undefined) {
      return undefined;
    }

    if (segment.kind === "literal") {
      if (segment.value !== part) {
        return undefined;
      }
      continue;
    }

    params[segment.name] = decodeURIComponent(part);
  }

  return params;
}

export function matchRoute(method: string, url: string): RouteMatch | undefined {
  const parts = splitPath(new URL(url, "http://localhost").pathname);
  const normalizedMethod = method.toUpperCase();

  for (const candidate of ROUTES) {
    if (candidate.method !== normalizedMethod) {
      continue;
    }

    const params = matchSegments(candidate.segments, parts);
    if (params) {
      return { type: candidate.type, params };
    }
  }

  return undefined;
}
