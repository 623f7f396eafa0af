/// <reference types="vite/client" />

// biome-ignore lint/correctness/noUnusedVariables: this is needed to augment the ImportMetaEnv type
interface ViteTypeOptions {
  // By adding this line, you can make the type of ImportMetaEnv strict
  // to disallow unknown keys.
  strictImportMetaEnv: unknown;
}

interface ImportMetaEnv {
  readonly VITE_SENTRY_DSN: string | undefined;
  readonly VITE_ENVIRONMENT: string | undefined;
  readonly VITE_CARD_STACK_CONFIG: string | undefined;
}

// biome-ignore lint/correctness/noUnusedVariables: this is needed to augment the ImportMeta type
interface ImportMeta {
  readonly env: ImportMetaEnv;
}
