export {
  PlaywrightFormElement,
  normalizeSnapshot,
  FORM_FILL_ATTR,
  CHOICE_ATTR,
  type PlaywrightFormElementOptions,
} from './PlaywrightFormElement.js';
export { collectFormElements, type CollectOptions } from './formElements.js';
