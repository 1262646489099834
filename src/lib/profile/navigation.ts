export const PROFILE_NAVIGATE_EVENT = 'profile:navigate';

export type ProfileNavigateDetail = { anchorId: string };

export function anchorIdFromHref(href: string | undefined): string | null {
  if (!href || !href.startsWith('#') || href.length < 2) {
    return null;
  }
  try {
    return decodeURIComponent(href.slice(1));
  } catch {
    // Malformed escapes in model output are not section links.
    return null;
  }
}

export function requestSectionFocus(anchorId: string) {
  window.dispatchEvent(new CustomEvent<ProfileNavigateDetail>(PROFILE_NAVIGATE_EVENT, { detail: { anchorId } }));
}

export function readNavigateDetail(event: Event): ProfileNavigateDetail | null {
  const detail: unknown = event instanceof CustomEvent ? event.detail : undefined;
  if (detail && typeof detail === 'object' && 'anchorId' in detail && typeof detail.anchorId === 'string') {
    return { anchorId: detail.anchorId };
  }
  return null;
}
