import { CampaignContext } from '../entities/CampaignContext';
import { Decision } from '../entities/Decision';
import { RenderedContent } from '../valueObjects/RenderedContent';

export interface IContentRenderer {
  render(decision: Decision, context: CampaignContext): RenderedContent;
}
