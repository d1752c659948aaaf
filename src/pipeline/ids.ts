const ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;
const PATH_PREFIXES = ['/embed/', '/v/', '/live/', '/shorts/'];

/**
 * Extracts a YouTube video ID from watch, youtu.be, embed, v, live and shorts
 * URLs, or returns the input if it already looks like an ID. Null otherwise.
 */
export function toVideoId(videoOrUrl: string): string | null {
  const input = videoOrUrl.trim();
  if (ID_PATTERN.test(input)) return input;
  let url: URL;
  try {
    url = new URL(input.startsWith('http') ? input : `https://${input}`);
  } catch {
    return null;
  }
  const host = url.hostname.replace(/^(www\.|m\.)/, '');
  let candidate: string | null = null;
  if (host === 'youtu.be') {
    candidate = url.pathname.slice(1).split('/')[0];
  } else if (host === 'youtube.com' || host === 'music.youtube.com') {
    if (url.pathname === '/watch') {
      candidate = url.searchParams.get('v');
    } else {
      const prefix = PATH_PREFIXES.find((p) => url.pathname.startsWith(p));
      if (prefix) candidate = url.pathname.slice(prefix.length).split('/')[0];
    }
  }
  return candidate && ID_PATTERN.test(candidate) ? candidate : null;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
