export interface PlayerPageInput {
  title: string;
  /** Root-relative URL path of the video, e.g. `/videos/clip.mp4` */
  videoSrc: string;
  mimeType: string;
}

export interface ShareResult {
  videoPath: string;
  pagePath: string;
  pageUrl: string;
  qrPath: string;
  /** Text encoded in the QR image */
  qrContent: string;
}
