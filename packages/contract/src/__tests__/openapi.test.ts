import { describe, it, expect } from 'vitest';
import { generateOpenApiDocument, toOpenApiPath } from '../openapi/generate.js';

describe('OpenAPI generation', () => {
  const doc = generateOpenApiDocument();

  it('converts path params', () => {
    expect(toOpenApiPath('/loans/:loanId/return')).toBe('/loans/{loanId}/return');
  });

  it('documents every loan path', () => {
    expect(Object.keys(doc.paths ?? {}).sort()).toEqual([
      '/loans',
      '/loans/target-kinds',
      '/loans/{loanId}',
      '/loans/{loanId}/return',
    ]);
  });

  it('uses 201 for loan creation', () => {
    const responses = doc.paths?.['/loans']?.post?.responses ?? {};
    expect(Object.keys(responses)).toContain('201');
    expect(Object.keys(responses)).not.toContain('200');
  });

  it('groups error codes by status', () => {
    const responses = doc.paths?.['/loans/{loanId}/return']?.post?.responses ?? {};
    expect(responses['409']).toMatchObject({ description: 'ALREADY_RETURNED' });
    expect(responses['403']).toMatchObject({ description: 'FORBIDDEN' });
    expect(responses['404']).toMatchObject({ description: 'NOT_FOUND' });
  });
});
