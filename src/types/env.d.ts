declare namespace NodeJS {
  interface ProcessEnv {
    DASHBOARD_DATA_DIR?: string
    PORT?: string
    MEDIA_COMPARE_LIMIT?: string
    RECENT_LIMIT?: string
    DEV_LOG?: string
  }
}
