import { redirect } from "next/navigation";
import { currentIdentity } from "@/lib/session";

export default async function Home() {
  redirect((await currentIdentity()) ? "/dashboard" : "/login");
}
