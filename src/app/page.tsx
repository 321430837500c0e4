import AnnotationWorkspace from "@/components/annotation-workspace";

export const dynamic = "force-dynamic";

type HomeProps = {
  searchParams: Promise<{ run_id?: string | string[] }>;
};

export default async function Home({ searchParams }: HomeProps) {
  const { run_id: runParam } = await searchParams;
  const runId = (Array.isArray(runParam) ? runParam[0] : runParam)?.trim() || null;

  return <AnnotationWorkspace initialRunId={runId} />;
}
