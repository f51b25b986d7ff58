import { defineConfig, loadEnv } from 'vite'

// Served from a sub-path when deployed as a project site
function resolveBase(mode: string): string {
  const env = loadEnv(mode, process.cwd(), '')
  const repoName = env.GITHUB_REPOSITORY?.split('/')[1]
  return env.CI && repoName ? `/${repoName}/` : './'
}

export default defineConfig(({ mode }) => ({
  base: resolveBase(mode),
  build: {
    outDir: 'dist',
  },
}))
