import { generateWheelResponse } from '../../server/generate';

export const runtime = 'nodejs';

export async function POST(request: Request) {
  return generateWheelResponse(request);
}
