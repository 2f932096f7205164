/**
 * Canonical API route constants
 * Paths are relative to ClientConfig.apiBaseUrl
 */

export const API_ROUTES = {
    AUTH: {
        LOGIN: '/auth/login',
        REGISTER: '/auth/register',
        REFRESH: '/auth/refresh',
        LOGOUT: '/auth/logout',
        ME: '/auth/me',
        VERIFY_TOKEN: '/auth/verify-token',
        PASSWORD_RESET: '/auth/password-reset',
        PASSWORD_RESET_CONFIRM: '/auth/password-reset-confirm',
    },

    USERS: {
        ME: '/users/me',
    },

    WASTE: {
        LIST: '/waste',
        CREATE: '/waste',
        GET: (id: string) => `/waste/${encodeURIComponent(id)}`,
        UPDATE: (id: string) => `/waste/${encodeURIComponent(id)}`,
        DELETE: (id: string) => `/waste/${encodeURIComponent(id)}`,
        COLLECT: (id: string) => `/waste/${encodeURIComponent(id)}/collect`,
        PROCESS: (id: string) => `/waste/${encodeURIComponent(id)}/process`,
        VALIDATE: (id: string) => `/waste/${encodeURIComponent(id)}/validate`,
        REJECT: (id: string) => `/waste/${encodeURIComponent(id)}/reject`,
        UPLOAD_IMAGE: (id: string) => `/waste/${encodeURIComponent(id)}/upload-image`,
    },

    HEALTH: '/health',
} as const;
