import { EarningsPlanner } from "@/components/earnings-planner";

export default function Home() {
  return <EarningsPlanner />;
}
