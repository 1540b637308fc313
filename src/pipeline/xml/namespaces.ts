import { inNamespace, type Step, type XmlElement } from '../../xml/tree.js';
import { NUTS_NAMESPACES } from './constants.js';

type StepBuilder = (localName: string, where?: Record<string, string>) => Step;

export interface TedNamespaces {
  /** Namespace of the document's root element; null when the root is un-namespaced. */
  primary: string | null;
  ted: StepBuilder;
  /** One builder per NUTS namespace, in probe order. */
  nuts: StepBuilder[];
}

export function resolveTedNamespaces(root: XmlElement): TedNamespaces {
  return {
    primary: root.namespace,
    ted: inNamespace(root.namespace),
    nuts: NUTS_NAMESPACES.map((uri) => inNamespace(uri)),
  };
}
