/**
 * Wiki contract used by the publish-page stage.
 *
 * Non-fatal failures (HTML error pages, permission problems, network errors,
 * missing credentials) come back as a `fallback` value instead of a throw.
 */

export type WikiResult<T> =
  | { kind: 'ok'; data: T }
  | { kind: 'fallback'; status: number; title: string; snippet: string };

export interface PublishedPage {
  pageId: string;
  url: string;
  action: 'created' | 'updated';
}

export interface Wiki {
  readonly isConfigured: boolean;

  /** Create the page, or update the one with the same title in the space */
  createOrUpdatePage(title: string, html: string): Promise<WikiResult<PublishedPage>>;
}
