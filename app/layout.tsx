import "./globals.css";
import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Handle Scout",
  description: "LLM-based Twitter handle discovery and validation for company lists",
};

export default function RootLayout({
  children,
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
