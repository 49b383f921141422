/**
 * Route storage
 *
 * Exports the content blob and the route table built from the web root.
 */

export { ContentBlob } from "./ContentBlob.ts";
export { RouteTable, type ReadonlyRouteTable } from "./RouteTable.ts";

const INDEX_SUFFIX = "/index.html";

/**
 * Route for a file given its path segments relative to the web root.
 * `a/index.html` collapses onto its directory, `a/`, and the root's onto `/`.
 */
export function routeForSegments(segments: readonly string[]): string {
  const route = `/${segments.join("/")}`;
  if (route.endsWith(INDEX_SUFFIX)) {
    return route.slice(0, route.length - INDEX_SUFFIX.length + 1);
  }
  return route;
}
