import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/shared-types', 'packages/client']);
