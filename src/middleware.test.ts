import { describe, it, expect } from 'vitest';
import { NextRequest } from 'next/server';
import { middleware, config } from './middleware';

describe('middleware', () => {
  it('only runs for the root path', () => {
    expect(config.matcher).toBe('/');
  });

  it('rewrites form posts on the root to the generate route', () => {
    const response = middleware(new NextRequest('http://localhost/', { method: 'POST' }));
    expect(response.headers.get('x-middleware-rewrite')).toBe('http://localhost/generate');
  });

  it('lets the form page through', () => {
    const response = middleware(new NextRequest('http://localhost/'));
    expect(response.headers.get('x-middleware-rewrite')).toBeNull();
    expect(response.headers.get('x-middleware-next')).toBe('1');
  });
});
