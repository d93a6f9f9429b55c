import type { Metadata } from "next";
import Link from "next/link";

type GlossaryEntry = {
  term: string;
  metric?: string;
  description: string;
};

type GlossarySection = {
  title: string;
  entries: GlossaryEntry[];
};

const glossarySections: GlossarySection[] = [
  {
    title: "Funnel & attrition",
    entries: [
      {
        term: "New clients per month",
        metric: "clients",
        description:
          "Clients signed in every month of the projection. A single month can be overridden to test a campaign spike or a slow month; the override only changes that month's intake.",
      },
      {
        term: "Cohort",
        description:
          "All clients activated in the same month, tracked together. A cohort's size is fixed when it is created; attrition is applied when its revenue is read, never by shrinking the stored size.",
      },
      {
        term: "Fixed cancellations",
        metric: "clients / month",
        description:
          "A constant number of cancellations deducted from each month's intake before the cohort is created. The net activations can reach zero but never go negative.",
      },
      {
        term: "Churn rate",
        metric: "%",
        description:
          "Constant monthly probability that an active client cancels. Rates are capped at 99% so a cohort always keeps a residual share.",
      },
      {
        term: "Survival fraction",
        description:
          "Expected share of a cohort still active at a given age: (1 − churn rate) raised to the cohort's age in months. The age follows the lifetime counting mode.",
      },
    ],
  },
  {
    title: "Contract & lifetime",
    entries: [
      {
        term: "Free months",
        metric: "months",
        description:
          "Months at the start of every contract in which the client pays nothing. Paying clients only include cohorts past their free period.",
      },
      {
        term: "Intro period",
        metric: "months",
        description:
          "Initial paid period charged at the intro amount before the recurring amount applies. Only used by Intro + Recurring contracts.",
      },
      {
        term: "Flat monthly contract",
        description:
          "Charges the same amount every paid month, regardless of the client's age.",
      },
      {
        term: "Client lifetime",
        metric: "months",
        description:
          "Hard cutoff after which a cohort stops generating recurring revenue. 0 means unlimited. Counted either from activation or from the first paid month.",
      },
    ],
  },
  {
    title: "Earnings",
    entries: [
      {
        term: "Client payments (gross)",
        description:
          "Sum over every active cohort of its paying clients multiplied by the contract price for the cohort's age.",
      },
      {
        term: "Commission from clients",
        metric: "%",
        description:
          "Gross client payments multiplied by the commission rate. Only earned when the payout policy includes recurring income.",
      },
      {
        term: "New sale income",
        description:
          "One-off bonus per new client signed this month. Commissionable bonuses are multiplied by the commission rate; flat bonuses are paid as entered.",
      },
      {
        term: "Payout duration",
        metric: "months",
        description:
          "Number of your own months, counted from the start of the projection, in which the new-sale bonus is paid. It does not depend on how long each client has been active.",
      },
      {
        term: "Payout policy",
        description:
          "Chooses which income streams count towards total earnings: bonus only, bonus plus recurring commission, or recurring commission only.",
      },
    ],
  },
];

export const metadata: Metadata = {
  title: "Glossary | Earnings Projector",
  description: "Definitions for the commission earnings projector inputs and outputs.",
};

export default function GlossaryPage() {
  return (
    <main className="min-h-dvh bg-background">
      <div className="mx-auto flex w-full max-w-5xl flex-col gap-12 px-6 py-12 lg:px-10 lg:py-16">
        <header className="space-y-4">
          <div className="space-y-2">
            <p className="text-sm font-semibold uppercase tracking-wide text-muted-foreground">
              Earnings Projector
            </p>
            <h1 className="text-3xl font-semibold tracking-tight text-foreground lg:text-4xl">
              Glossary of terms
            </h1>
            <p className="text-base text-muted-foreground">
              Every term below maps to a control or a column in the projection tables and the exported workbook.
            </p>
          </div>
          <Link
            href="/"
            className="inline-flex items-center gap-2 text-sm font-medium text-cta transition hover:text-cta/80"
          >
            <span aria-hidden>←</span>
            Back to the projector
          </Link>
        </header>

        <section className="rounded-xl border border-border/60 bg-muted/10 p-6 text-sm text-muted-foreground">
          <h2 className="mb-3 text-base font-semibold uppercase tracking-wide text-foreground">
            Methodology
          </h2>
          <ol className="space-y-3 list-decimal pl-5">
            <li>
              Each month a new cohort is created from that month&apos;s intake, less fixed cancellations when that mode is selected. Cumulative signed clients add up these net activations and ignore later churn.
            </li>
            <li>
              Recurring revenue walks every cohort born so far. Cohorts outside the lifetime window are skipped; the rest are scaled by the survival fraction in churn mode and priced by the contract schedule for their age.
            </li>
            <li>
              Commission applies the commission rate to gross client payments. The new-sale bonus is paid on this month&apos;s new clients while the projection is inside the payout duration. Total earnings add whichever streams the payout policy includes.
            </li>
            <li>
              Yearly totals group months 1–12, 13–24 and so on; a final partial year sums the months it has.
            </li>
          </ol>
        </section>

        <div className="space-y-10">
          {glossarySections.map((section) => (
            <section key={section.title} className="space-y-4">
              <h2 className="text-xl font-semibold text-foreground lg:text-2xl">
                {section.title}
              </h2>
              <div className="rounded-xl border border-border/60 bg-muted/20 p-6">
                <dl className="space-y-4">
                  {section.entries.map((entry) => (
                    <div
                      key={entry.term}
                      className="space-y-1 border-b border-border/40 pb-4 last:border-b-0 last:pb-0"
                    >
                      <dt className="flex items-center gap-3 text-sm font-semibold text-foreground">
                        <span>{entry.term}</span>
                        {entry.metric ? (
                          <span className="rounded bg-background px-2 py-0.5 text-xs uppercase tracking-wide text-muted-foreground">
                            {entry.metric}
                          </span>
                        ) : null}
                      </dt>
                      <dd className="text-sm leading-relaxed text-muted-foreground">
                        {entry.description}
                      </dd>
                    </div>
                  ))}
                </dl>
              </div>
            </section>
          ))}
        </div>
      </div>
    </main>
  );
}
