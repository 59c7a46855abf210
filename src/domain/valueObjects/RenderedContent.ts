export type SupportedPlatform = 'twitter' | 'instagram' | 'linkedin';

export interface RenderedContent {
  readonly platform: SupportedPlatform;
  readonly caption: string;
  readonly hashtags: ReadonlyArray<string>;
  readonly postingTime: string;
  readonly charCount: number;
  /** handed to the image collaborator; never read back by the council */
  readonly imagePrompt: string;
}
