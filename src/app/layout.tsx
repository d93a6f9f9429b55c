import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Earnings Projector",
  description:
    "Project monthly commission and new-sale income from a recurring-revenue client funnel.",
  openGraph: {
    title: "Earnings Projector",
    description:
      "Model client intake, churn, contract pricing and payout policy, then export the projection to Excel.",
  },
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="font-sans antialiased">
        {children}
      </body>
    </html>
  );
}
