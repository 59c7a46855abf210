import { TemplateContentRenderer, normalizePlatform, toHashtag } from '../../infrastructure/content/TemplateContentRenderer';
import { makeDecision, sampleContext } from '../helpers/councilFixtures';

describe('TemplateContentRenderer', () => {
  const renderer = new TemplateContentRenderer();

  it('should lay out a twitter post with brand and industry hashtags', () => {
    const content = renderer.render(makeDecision({ approach: 'Bold idea' }), sampleContext);

    expect(content.platform).toBe('twitter');
    expect(content.hashtags).toEqual(['#Acme', '#Technology']);
    expect(content.caption).toBe('Bold idea\n\nDiscover Acme: Task planner\n\n#Acme #Technology');
    expect(content.charCount).toBe(content.caption.length);
    expect(content.postingTime).toBe('9:00 AM EST');
    expect(content.imagePrompt).toBe('Acme Task planner, modern professional design, marketing photography');
  });

  it('should draw hashtags from trends, then the fallback list', () => {
    const context = { ...sampleContext, trends: ['AI Tools (Source: Sample, Volume: high)'] };

    const content = renderer.render(makeDecision({ platform: 'Instagram' }), context);

    expect(content.platform).toBe('instagram');
    expect(content.hashtags).toEqual([
      '#Acme',
      '#Technology',
      '#AITools',
      '#Marketing',
      '#Growth',
      '#Innovation',
      '#Community',
      '#Launch'
    ]);
  });

  it('should truncate the body to fit the platform limit', () => {
    const content = renderer.render(makeDecision({ approach: 'x'.repeat(300) }), sampleContext);

    expect(content.charCount).toBe(280);
    expect(content.caption).toBe(`${'x'.repeat(258)}...\n\n#Acme #Technology`);
  });

  it('should map unknown platforms to twitter limits', () => {
    expect(normalizePlatform('generic')).toBe('twitter');
    expect(normalizePlatform(' LinkedIn ')).toBe('linkedin');
  });

  it('should build camel-cased hashtags', () => {
    expect(toHashtag('back to school')).toBe('#BackToSchool');
    expect(toHashtag('!!!')).toBeNull();
  });
});
