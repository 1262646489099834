import { createElement } from 'react';
import { renderToString } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import { ProfileSections } from '@/components/profile/ProfileSections';
import { TEST_PROFILE } from '@profile-chat/test-support/fixtures';

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('ProfileSections', () => {
  it('renders every section anchor', () => {
    const html = renderToString(createElement(ProfileSections, { profile: TEST_PROFILE }));
    for (const anchorId of ['about-me', 'my-skills', 'my-education', 'my-projects', 'contact-me']) {
      expect(html).toContain(`id="${anchorId}"`);
    }
  });

  it('renders repeated skills and project names once per entry', () => {
    const profile = {
      ...TEST_PROFILE,
      skills: ['SQL', 'SQL', 'Go'],
      projects: [
        { name: 'Side App', description: 'First take on the idea.' },
        { name: 'Side App', description: 'Second take on the idea.' },
      ],
    };

    const html = renderToString(createElement(ProfileSections, { profile, defaultExpanded: true }));

    expect(countOccurrences(html, '>SQL</li>')).toBe(2);
    expect(html).toContain('>First take on the idea.</p>');
    expect(html).toContain('>Second take on the idea.</p>');
  });
});
