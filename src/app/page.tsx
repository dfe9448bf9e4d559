import InventoryDashboard from "@/components/InventoryDashboard";
import { InventoryDataProvider } from "@/contexts/InventoryDataContext";

export default function Home() {
  return (
    <InventoryDataProvider>
      <InventoryDashboard />
    </InventoryDataProvider>
  );
}
