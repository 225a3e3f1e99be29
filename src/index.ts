// Applier
export * from './applier/AnsiblePlaybookApplier';
export * from './applier/ConfigurationApplier';

// Cluster
export * from './cluster/ClusterApiClient';

// Config
export * from './config/ProvisionerConfig';
export * from './config/normalize';

// Credential
export * from './credential/Credential';
export * from './credential/CredentialFetcher';
export * from './credential/CredentialFile';

// Endpoint
export * from './endpoint/EndpointResolver';

// Errors
export * from './errors/ProvisioningError';

// Event
export * from './event/EventTracker';

// Logging
export * from './logging/ConfigurableLoggerFactory';
export * from './logging/LogContext';

// Provisioner
export * from './provisioner/TunnelProvisioner';
export * from './provisioner/createProvisioner';

// Reconcile
export * from './reconcile/ReconciliationEngine';

// State
export * from './state/EventStateStore';
export * from './state/RunLock';

// Status
export * from './status/InitStatusReporter';

// Tunnel
export * from './tunnel/TunnelHealthProber';

// Util
export * from './util/ProcessRunner';
export * from './util/RetryPolicy';
export * from './util/parseJson';
