import React from "react";
import Link from "next/link";
import { currentIdentity } from "@/lib/session";
import "./globals.css";

export const metadata = {
  title: "Equipment Desk",
  description: "Equipment reservations, loans and service tickets"
};

export default async function RootLayout({ children }: { children: React.ReactNode }) {
  const identity = await currentIdentity();
  return (
    <html lang="en">
      <body>
        <div className="layout">
          <aside className="sidebar">
            <div className="brand">Equipment Desk</div>
            {identity ? (
              <nav className="nav">
                <Link href="/dashboard">🏠 Dashboard</Link>
                <Link href="/equipment">📦 Equipment</Link>
                <Link href="/reservations">📅 Reservations</Link>
                <Link href="/reservations/calendar">🗓 Calendar</Link>
                {identity.isStaff && <Link href="/loans">🚚 Loans</Link>}
                <Link href="/tickets">🛠 Service tickets</Link>
                <div className="subtle" style={{ marginTop: 16 }}>
                  {identity.fullName}<br />{identity.role}
                </div>
                <Link href="/logout">Log out</Link>
              </nav>
            ) : (
              <nav className="nav">
                <Link href="/login">Log in</Link>
                <Link href="/register">Register</Link>
              </nav>
            )}
          </aside>
          <main className="main">
            {children}
          </main>
        </div>
      </body>
    </html>
  );
}
