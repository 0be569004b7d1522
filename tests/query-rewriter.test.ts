import { describe, it, expect } from '@jest/globals';
import { IdentityQueryRewriter, SynonymQueryRewriter } from '../src/search/QueryRewriter.js';

describe('SynonymQueryRewriter', () => {
  const rewriter = new SynonymQueryRewriter();

  it('should put the normalized query first and swap one word at a time', () => {
    expect(rewriter.rewrite('Database  Connection pattern', 3)).toEqual([
      'database connection pattern',
      'db connection pattern',
      'database conn pattern',
    ]);
  });

  it('should stop at the variant limit', () => {
    expect(rewriter.rewrite('database connection pattern', 1)).toEqual(['database connection pattern']);
  });

  it('should keep punctuation around a swapped word', () => {
    expect(rewriter.rewrite('(db) pooling', 2)).toEqual(['(db) pooling', '(database) pooling']);
  });

  it('should return the query alone when no word has a synonym', () => {
    expect(rewriter.rewrite('flexbox layout', 3)).toEqual(['flexbox layout']);
  });

  it('should return no variants for a blank query', () => {
    expect(rewriter.rewrite('   ', 3)).toEqual([]);
  });

  it('should accept custom synonym groups', () => {
    const custom = new SynonymQueryRewriter([['pg', 'postgres', 'postgresql']]);
    expect(custom.rewrite('pg vacuum', 5)).toEqual(['pg vacuum', 'postgres vacuum', 'postgresql vacuum']);
  });
});

describe('IdentityQueryRewriter', () => {
  it('should only normalize', () => {
    expect(new IdentityQueryRewriter().rewrite('  DB   Pool ')).toEqual(['db pool']);
  });
});
