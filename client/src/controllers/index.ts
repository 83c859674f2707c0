import type { Definition } from '@hotwired/stimulus';

import { AutogrowController } from './AutogrowController';

/**
 * Controllers registered by `initStimulus` unless other definitions are given.
 */
export const coreControllerDefinitions: Definition[] = [
  { controllerConstructor: AutogrowController, identifier: 'autogrow' },
];
