export interface Workspace {
  /** Absolute path of the repository root */
  root: string;
  videosDir: string;
  pagesDir: string;
  qrcodesDir: string;
  /** Public root the repository is served under, without a trailing slash */
  pagesBaseUrl: string;
}
