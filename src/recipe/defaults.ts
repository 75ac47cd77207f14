import type { RecipeInput } from './types.js';

/**
 * Recipe written by `imagesmith init`: a release build of a Rust binary on
 * Debian, published to GHCR. The repository path is derived from the source
 * repository when the recipe leaves it out.
 */
export const DEFAULT_RECIPE: RecipeInput = {
  name: 'app',
  build: {
    image: 'debian:bullseye-slim',
    packages: ['curl', 'build-essential', 'pkg-config', 'libssl-dev'],
    setup: [
      "curl --proto '=https' --tlsv1.2 -sSf https://sh.rustup.rs | sh -s -- -y --default-toolchain stable",
    ],
    env: { PATH: '/root/.cargo/bin:${PATH}' },
    context: '.',
    workdir: '/app',
    command: ['cargo', 'build', '--release'],
    output: '/app/target/release/app',
  },
  runtime: {
    base: 'debian:bullseye-slim',
    user: 'app',
    artifact_name: 'app',
    command: ['./app'],
  },
  slim: {
    enabled: true,
    tool: 'docker-slim',
    http_probe: false,
    continue_after: 30,
    fallback_to_unslimmed: false,
  },
  publish: {
    registry: 'ghcr.io',
    tag: 'latest',
    username_env: 'REGISTRY_USERNAME',
    token_env: 'REGISTRY_TOKEN',
  },
  triggers: {
    push: { branches: ['main'] },
    manual: true,
  },
};
