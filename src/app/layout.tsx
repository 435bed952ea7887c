import type { Metadata } from 'next';

export const metadata: Metadata = {
  title: '2PD Wheel Generator',
  description:
    'Generate a printable two-point discrimination wheel from your own list of distances.',
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body style={{ fontFamily: 'system-ui, sans-serif', margin: 0, background: '#f8fafc' }}>
        {children}
      </body>
    </html>
  );
}
