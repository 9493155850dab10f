export const DOCUMENT_LIBRARY_BASE_TEMPLATE = 101 as const;
export const RENDER_LIST_ROW_LIMIT = 5000 as const;

// Login names of one-time-passcode guests carry this (URL encoded) claim
export const AD_HOC_GUEST_LOGIN_MARKER = 'urn%3aspo%3aguest' as const;

export const HTTP_STATUS_OK_MAX = 299 as const;

export const MAX_EXPORT_FOLDER_LEVELS = 10 as const;

export const IMPORT_HARD_FAILURE_ERROR_LIMIT = 10 as const;
export const IMPORT_WARNING_ERROR_LIMIT = 5 as const;

export const ALL_SITES_OPTION = 'All Sites' as const;
