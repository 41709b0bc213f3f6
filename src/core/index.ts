// Core module exports

// Orchestration
export { DigestRecorder, APK_SET_MODES } from './digestRecorder';
export type { DigestRequest, DigestRecorderEvents } from './digestRecorder';
export { SignatureApplier } from './signatureApplier';
export type { ApplyRequest, ApplyResult, SignatureApplierEvents } from './signatureApplier';

// Workspace
export { Workspace, withWorkspace } from './workspace';

// APK Set
export { walkApkSet } from './apkset/apkSetWalker';

// Bundle expansion
export { BundletoolExpander, apkSetFileName, buildApksArguments } from './bundle/bundleExpander';
export type { BundleExpander } from './bundle/bundleExpander';
export { createDisposableKeystore } from './bundle/disposableKeystore';
export type { KeystoreInfo } from './bundle/disposableKeystore';

// Signer
export * from './signer';

// Transfer file
export * from './transfer';

// Config
export { ConfigManager, getConfigManager } from './config';
export type { Config } from './config';

// Errors
export * from './errors';

// Shared utilities
export * from './shared';
