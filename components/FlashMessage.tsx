import { readFlash, type SearchParams } from "@/lib/flash";

export default function FlashMessage({ params }: { params: SearchParams }) {
  const flash = readFlash(params);
  if (!flash) return null;
  return <div className={`flash ${flash.kind}`} role="status">{flash.message}</div>;
}
