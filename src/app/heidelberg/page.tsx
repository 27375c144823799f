import { redirect } from 'next/navigation';
import { CatechismReader } from '@/components/CatechismReader';
import { buildReaderHref, parseReaderQuery, resolvePage } from '@/lib/reader';

interface HeidelbergPageProps {
  searchParams: Promise<Record<string, string | string[] | undefined>>;
}

export default async function HeidelbergPage({ searchParams }: HeidelbergPageProps) {
  const params = await searchParams;
  const query = parseReaderQuery(params);

  const raw = params.page;
  const requestedPage = (Array.isArray(raw) ? raw[0] : raw) ?? null;

  // A fresh document has not been scrolled anywhere, so the scroll marker
  // would suppress the scroll this load needs. Clamped or malformed pages
  // load under their canonical URL.
  if (requestedPage !== null) {
    const page = resolvePage(requestedPage);
    if (query.fromScroll || String(page) !== requestedPage) {
      redirect(buildReaderHref(page));
    }
  }

  return (
    <CatechismReader
      requestedPage={requestedPage}
      initialPage={resolvePage(requestedPage)}
    />
  );
}
