import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'bin/fixture-harness': 'src/bin/fixture-harness.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  sourcemap: true,
  clean: true,
  dts: false, // CLI bundle only; the library is consumed from source
  external: ['@aws-sdk/client-ec2', '@aws-sdk/client-iam', '@aws-sdk/client-sts'],
  noExternal: ['@fixture-harness/shared'],
  minify: false,
  splitting: false,
});
