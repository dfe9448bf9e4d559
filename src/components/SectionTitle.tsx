interface SectionTitleProps {
  title: string;
  icon?: string;
  count?: number;
  colorClass?: string;
}

export default function SectionTitle({ title, icon, count, colorClass = "bg-blue-500" }: SectionTitleProps) {
  return (
    <div className="flex items-center gap-3 mb-4 mt-6">
      <div className={`w-1 h-7 ${colorClass} rounded-full`}></div>
      <h2 className="text-xl font-bold text-gray-800 flex items-center gap-2">
        {icon && <span>{icon}</span>}
        {title}
      </h2>
      {count !== undefined && (
        <span className="px-2 py-0.5 rounded-full bg-gray-100 text-xs font-medium text-gray-500">
          {count.toLocaleString("en-US")}
        </span>
      )}
    </div>
  );
}
