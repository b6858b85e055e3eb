import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/eventbus',
  'packages/decision',
  'packages/voice',
  'packages/terminal',
  'packages/bridge',
]);
