/// <reference types="vite/client" />

// Global build-mode flags for dead code elimination
declare const __DEV__: boolean;
