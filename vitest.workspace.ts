import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/llm', 'packages/analyst']);
