import type { Controller, Definition } from '@hotwired/stimulus';
import { Application } from '@hotwired/stimulus';

import { coreControllerDefinitions } from '../controllers';

export class AutogrowApplication extends Application {
  queryController(identifier: string): Controller | null {
    const element = document.querySelector(
      `[${this.schema.controllerAttribute}~="${identifier}"]`,
    );
    return element
      ? this.getControllerForElementAndIdentifier(element, identifier)
      : null;
  }

  queryControllerAll(identifier: string): Controller[] {
    return Array.from(
      document.querySelectorAll(
        `[${this.schema.controllerAttribute}~="${identifier}"]`,
      ),
    )
      .map((element) =>
        this.getControllerForElementAndIdentifier(element, identifier),
      )
      .filter((controller): controller is Controller => controller !== null);
  }
}

/**
 * Initialises the Stimulus application, loads the provided controller
 * definitions and returns the app instance.
 *
 * Turns on debug mode if in local development, or later on when the
 * `autogrow:stimulus-enable-debug` event is dispatched on the window.
 */
export const initStimulus = ({
  debug = process.env.NODE_ENV === 'development',
  definitions = coreControllerDefinitions,
  element = document.documentElement,
}: {
  debug?: boolean;
  definitions?: Definition[];
  element?: Element;
} = {}): AutogrowApplication => {
  const application = new AutogrowApplication(element);
  application.debug = debug;

  window.addEventListener(
    'autogrow:stimulus-enable-debug',
    () => {
      application.debug = true;
      application.logDebugActivity('application', 'debug enabled');
    },
    { once: true },
  );

  application.load(definitions);
  application.start().catch((error: unknown) => {
    application.handleError(
      error instanceof Error ? error : new Error(String(error)),
      'error starting the application',
      {},
    );
  });

  return application;
};
