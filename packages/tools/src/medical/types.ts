import type { BackendModel, Logger } from '@lingshu/shared';

export interface MedicalToolDeps {
  model: BackendModel;
  logger?: Logger;
  /** Clock for report dates */
  now?: () => Date;
}
