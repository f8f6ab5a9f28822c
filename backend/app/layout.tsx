import type { ReactNode } from "react";

export const metadata = {
  title: "Movie Catalog",
  description: "검색 가능한 영화 카탈로그",
};

export default function RootLayout({
  children,
}: {
  children: ReactNode;
}) {
  return (
    <html lang="ko">
      <body style={{ fontFamily: "system-ui, sans-serif", margin: 0 }}>{children}</body>
    </html>
  );
}
