import { NextResponse, type NextRequest } from 'next/server';

// Older clients post the form back to "/"
export function middleware(request: NextRequest) {
  if (request.method === 'POST') {
    return NextResponse.rewrite(new URL('/generate', request.url));
  }
  return NextResponse.next();
}

export const config = {
  matcher: '/',
};
