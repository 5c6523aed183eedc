import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import { registerAction } from "@/lib/actions/auth.actions";
import type { SearchParams } from "@/lib/flash";

export default async function RegisterPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  return (
    <div className="stack" style={{ maxWidth: 480 }}>
      <h2 className="page-title">Register</h2>
      <FlashMessage params={await searchParams} />
      <form action={registerAction} className="form-grid card">
        <input name="full_name" placeholder="Full name" required />
        <input type="email" name="email" placeholder="you@example.com" required />
        <input type="password" name="password" placeholder="Password (8+ characters)" minLength={8} required />
        <p className="subtle">New accounts are student accounts. Ask the lab administrator for staff access.</p>
        <div><button className="btn primary" type="submit">Create account</button></div>
      </form>
      <p className="subtle">Already registered? <Link href="/login">Log in</Link></p>
    </div>
  );
}
