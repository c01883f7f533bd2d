export const MAVEN_SEARCH_URL = "https://search.maven.org/solrsearch/select";
export const MAVEN_REPOSITORY_URL = "https://repo1.maven.org/maven2";

/** Extension tag the search index reports for a published CycloneDX JSON SBOM */
export const CYCLONEDX_CLASSIFIER = "-cyclonedx.json";

/** Free-text query matching artifacts whose latest version carries an SBOM */
export const ARTIFACT_SEARCH_TERM = "cyclonedx.json";

export const DEFAULT_PAGE_SIZE = 150;
export const DEFAULT_MAX_PAGES = 1000;
export const DEFAULT_MIN_COMPONENTS = 10;
export const DEFAULT_CONCURRENCY = 5;
export const MAX_CONCURRENCY = 32;
export const DEFAULT_RETRIES = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;
export const DEFAULT_TIMEOUT_MS = 30000;
