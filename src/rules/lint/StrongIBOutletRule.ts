/**
 * strong_iboutlet: `@IBOutlet` properties should not be `weak` or `unowned`.
 */

import { z } from 'zod';
import { defineRule } from '../../engine/defineRule.js';
import { firstToken, withChild, withChildren, withLeadingTrivia } from '../../syntax/SyntaxTree.js';
import { attributeName, Layout, modifierName, variableDecl } from '../../syntax/nodes.js';
import type { SyntaxNode } from '../../syntax/types.js';

const OWNERSHIP_MODIFIERS = new Set(['weak', 'unowned']);

/**
 * The weak/unowned modifier of an outlet declaration, or null.
 */
function ownershipModifier(node: SyntaxNode): SyntaxNode | null {
  const decl = variableDecl(node);
  const isOutlet = decl.attributes.some(attribute => attributeName(attribute) === 'IBOutlet');
  if (!isOutlet) return null;
  return decl.modifiers.find(modifier => OWNERSHIP_MODIFIERS.has(modifierName(modifier).text)) ?? null;
}

export const strongIBOutlet = defineRule({
  identifier: 'strong_iboutlet',
  parameters: z.object({}).strict(),

  visit: () => ({
    VariableDecl: (cursor, context) => {
      const modifier = ownershipModifier(cursor.node);
      if (modifier === null) return;
      const position = cursor.positionOf(modifierName(modifier));
      if (position !== undefined) context.report(position);
    },
  }),

  rewrite: () => ({
    VariableDecl: node => {
      const modifier = ownershipModifier(node);
      const { modifierList } = variableDecl(node);
      if (modifier === null || modifierList === null) return null;

      const index = modifierList.children.indexOf(modifier);
      const remaining = modifierList.children.filter((_, i) => i !== index);
      const trivia = firstToken(modifier)?.leadingTrivia ?? '';

      // The removed modifier's leading trivia moves to whatever follows it.
      const following = remaining[index];
      if (following !== undefined && following !== null) {
        remaining[index] = withLeadingTrivia(following, trivia);
        return withChild(node, Layout.VariableDecl.modifiers, withChildren(modifierList, remaining));
      }

      const withoutModifier = withChild(
        node,
        Layout.VariableDecl.modifiers,
        remaining.length > 0 ? withChildren(modifierList, remaining) : null
      );
      const keyword = variableDecl(withoutModifier).bindingKeyword;
      return withChild(withoutModifier, Layout.VariableDecl.bindingKeyword, withLeadingTrivia(keyword, trivia));
    },
  }),
});
