import type { Credential } from '../credential/Credential';

export interface ApplyContext {
  /** ResolvedEndpoint */
  endpoint: string;
  eventId: string;
}

/**
 * 把凭据应用到本机、建立隧道的外部自动化。
 * 成功时 resolve，失败时以 ApplierFailure reject。
 */
export interface ConfigurationApplier {
  apply(credential: Credential, context: ApplyContext): Promise<void>;
}
