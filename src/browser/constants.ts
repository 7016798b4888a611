export const BING_URL = 'https://www.bing.com';

export const SEARCH_INPUT_SELECTOR = '#sb_form_q';
export const SIGN_IN_SELECTOR = '#id_l';

// Process names Edge runs under; lock holders outside this list are never terminated.
export const EDGE_PROCESS_NAMES = [
  'msedge',
  'msedge.exe',
  'Microsoft Edge',
  'microsoft-edge',
  'microsoft-edge-stable',
  'microsoft-edge-beta',
  'microsoft-edge-dev',
] as const;

export const EDGE_LAUNCH_FLAGS = [
  '--no-sandbox',
  '--disable-features=ImprovedCookieControls,LazyFrameLoading',
  '--disable-hang-monitor',
  '--disable-popup-blocking',
  '--disable-prompt-on-repost',
  '--disable-sync',
  '--no-first-run',
  '--no-default-browser-check',
  '--window-size=1280,900',
] as const;

// Net errors a retry cannot fix.
export const UNRECOVERABLE_NET_ERRORS = [
  'net::ERR_INVALID_URL',
  'net::ERR_BLOCKED_BY_CLIENT',
  'net::ERR_BLOCKED_BY_ADMINISTRATOR',
  'net::ERR_UNSAFE_PORT',
  'net::ERR_DISALLOWED_URL_SCHEME',
] as const;
