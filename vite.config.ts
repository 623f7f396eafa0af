import tailwindcss from '@tailwindcss/vite';
import react from '@vitejs/plugin-react';
import { defineConfig, loadEnv } from 'vite';
import tsconfigPaths from 'vite-tsconfig-paths';
import { JsonCardStackConfigSchema } from './app/features/stacking-cards/card-stack-config';

function validateEnv(mode: string) {
  const env = loadEnv(mode, process.cwd(), 'VITE_');
  if (env.VITE_CARD_STACK_CONFIG) {
    JsonCardStackConfigSchema.parse(env.VITE_CARD_STACK_CONFIG);
  }
}

export default defineConfig((config) => {
  validateEnv(config.mode);

  return {
    plugins: [tailwindcss(), react(), tsconfigPaths()],
  };
});
