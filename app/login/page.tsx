import Link from "next/link";
import FlashMessage from "@/components/FlashMessage";
import { loginAction } from "@/lib/actions/auth.actions";
import type { SearchParams } from "@/lib/flash";

export default async function LoginPage({ searchParams }: { searchParams: Promise<SearchParams> }) {
  return (
    <div className="stack" style={{ maxWidth: 480 }}>
      <h2 className="page-title">Log in</h2>
      <FlashMessage params={await searchParams} />
      <form action={loginAction} className="form-grid card">
        <input type="email" name="email" placeholder="you@example.com" required />
        <input type="password" name="password" placeholder="Password" required />
        <div><button className="btn primary" type="submit">Log in</button></div>
      </form>
      <p className="subtle">No account yet? <Link href="/register">Register</Link></p>
    </div>
  );
}
