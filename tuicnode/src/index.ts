export * from './config/config';
export * from './managers/CertificateManager';
export * from './managers/CredentialStore';
export * from './services/BinaryProvisioner';
export * from './services/ConfigSynthesizer';
export * from './services/NetworkInfoResolver';
export * from './services/LinkEncoder';
export * from './services/Orchestrator';
export * from './utils/errors';
export * from './utils/random';
