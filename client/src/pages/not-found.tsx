import { Link } from "wouter";

export default function NotFound() {
  return (
    <main className="flex min-h-screen flex-col items-center justify-center gap-3 text-slate-300">
      <h1 className="text-xl font-semibold">404 - Page not found</h1>
      <Link href="/" className="text-sm text-sky-400 underline">
        Back to the calculator
      </Link>
    </main>
  );
}
