import ts from 'typescript';

/**
 * Source text of a node. The printer behind `getText()` can overflow the stack on deeply nested
 * generic types; identifiers fall back to their name and anything else to a placeholder.
 */
export function safeNodeText(node: ts.Node | undefined, sf?: ts.SourceFile): string {
  if (!node) return '';
  try {
    return sf ? node.getText(sf) : node.getText();
  } catch (e) {
    if (e instanceof RangeError) {
      if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) return node.text;
      return '[unprintable]';
    }
    throw e;
  }
}
